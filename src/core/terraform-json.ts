import type { JsonObject } from "./util.js";

export const CATEGORIES = [
  "terraform",
  "provider",
  "resource",
  "data",
  "variable",
  "output",
  "locals",
] as const;

export type Category = (typeof CATEGORIES)[number];

export type ProviderEntry = JsonObject | readonly JsonObject[];

export type TerraformJson = {
  readonly terraform?: JsonObject;
  readonly provider?: Record<string, ProviderEntry>;
  readonly resource?: Record<string, Record<string, JsonObject>>;
  readonly data?: Record<string, Record<string, JsonObject>>;
  readonly variable?: Record<string, JsonObject>;
  readonly output?: Record<string, JsonObject>;
  readonly locals?: JsonObject;
};
