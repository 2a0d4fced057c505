import { describe, expect, test } from "vitest";
import { Testing } from "../../testing/index.js";
import { validate } from "../../schema/validate.js";
import { autoscalingGroupSchema, awsAutoscalingGroup } from "./autoscaling-group.js";
import { awsLaunchTemplate } from "./launch-template.js";

const base = {
  min_size: 1,
  max_size: 3,
  launch_template: { id: "lt-123" },
  vpc_zone_identifier: ["subnet-a", "subnet-b"],
};

const errorOf = (raw: Record<string, unknown>) =>
  validate(autoscalingGroupSchema, raw)._unsafeUnwrapErr().message;

describe("aws_autoscaling_group attributes", () => {
  test("applies defaults", () => {
    const { attributes, derived } = validate(autoscalingGroupSchema, base)._unsafeUnwrap();

    expect(attributes.default_cooldown).toBe(300);
    expect(attributes.health_check_type).toBe("EC2");
    expect(attributes.health_check_grace_period).toBe(300);
    expect(attributes.wait_for_capacity_timeout).toBe("10m");
    expect(attributes.launch_template).toEqual({ id: "lt-123", version: "$Latest" });
    expect(derived.usesLaunchTemplate).toBe(true);
    expect(derived.usesMixedInstances).toBe(false);
    expect(derived.usesTargetGroups).toBe(false);
  });

  test("min_size must not exceed max_size", () => {
    expect(errorOf({ ...base, min_size: 10, max_size: 5 })).toBe(
      "min_size (10) cannot be greater than max_size (5)",
    );
  });

  test("desired_capacity must be within bounds", () => {
    expect(errorOf({ ...base, min_size: 2, max_size: 10, desired_capacity: 15 })).toBe(
      "desired_capacity (15) must be between min_size (2) and max_size (10)",
    );
  });

  test("requires a launch source", () => {
    expect(errorOf({ min_size: 1, max_size: 2, availability_zones: ["us-east-1a"] })).toBe(
      "Auto Scaling Group must specify one of: " +
        "launch_configuration, launch_template, or mixed_instances_policy",
    );
  });

  test("allows only one launch source", () => {
    expect(errorOf({ ...base, launch_configuration: "lc-web" })).toBe(
      "Auto Scaling Group can only specify one of: " +
        "launch_configuration, launch_template, or mixed_instances_policy",
    );
  });

  test("requires a network placement", () => {
    expect(errorOf({ min_size: 1, max_size: 2, launch_configuration: "lc-web" })).toBe(
      "Auto Scaling Group must specify either vpc_zone_identifier or availability_zones",
    );
  });

  test("launch_template needs an id or a name", () => {
    expect(errorOf({ ...base, launch_template: { version: "1" } })).toBe(
      "launch_template must specify either id or name",
    );
  });

  test("rejects negative sizes", () => {
    expect(errorOf({ ...base, min_size: -1 })).toBe("min_size: must be greater than or equal to 0");
  });
});

describe("awsAutoscalingGroup", () => {
  test("renders a minimal group", () => {
    const session = Testing.session();
    awsAutoscalingGroup(session, "web", base);

    expect(Testing.synth(session).resource?.["aws_autoscaling_group"]).toEqual({
      web: {
        min_size: 1,
        max_size: 3,
        launch_template: { id: "lt-123", version: "$Latest" },
        vpc_zone_identifier: ["subnet-a", "subnet-b"],
        health_check_type: "EC2",
        health_check_grace_period: 300,
        wait_for_capacity_timeout: "10m",
      },
    });
  });

  test("renders repeated tag blocks and instance refresh", () => {
    const session = Testing.session();
    awsAutoscalingGroup(session, "web", {
      ...base,
      default_cooldown: 60,
      tags: [
        { key: "Name", value: "web" },
        { key: "Env", value: "prod", propagate_at_launch: false },
      ],
      instance_refresh: { instance_warmup: 120 },
    });

    const group = Testing.synth(session).resource?.["aws_autoscaling_group"]?.["web"];
    expect(group?.["default_cooldown"]).toBe(60);
    expect(group?.["tag"]).toEqual([
      { key: "Name", value: "web", propagate_at_launch: true },
      { key: "Env", value: "prod", propagate_at_launch: false },
    ]);
    expect(group?.["instance_refresh"]).toEqual({
      strategy: "Rolling",
      preferences: { min_healthy_percentage: 90, instance_warmup: 120 },
    });
  });

  test("wires a launch template reference", () => {
    const session = Testing.session();
    const template = awsLaunchTemplate(session, "web", { name_prefix: "web-" });
    const group = awsAutoscalingGroup(session, "web", {
      ...base,
      launch_template: { id: template.id, version: template.outputs["latest_version"] },
    });

    expect(group.attributes.launch_template).toEqual({
      id: "${aws_launch_template.web.id}",
      version: "${aws_launch_template.web.latest_version}",
    });
    expect(group.attr("name")).toBe("${aws_autoscaling_group.web.name}");
  });
});
