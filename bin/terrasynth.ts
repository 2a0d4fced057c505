#!/usr/bin/env node
import { run } from "../src/cli/index.js";

run();
