import { z } from "zod";
import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { arrayOf, defaulted, optional, required, value } from "../../schema/field.js";
import {
  anyOf,
  atMostOneOf,
  between,
  exactlyOneOf,
  invariant,
  ordered,
} from "../../schema/invariants.js";
import { nested } from "../../schema/validate.js";
import { bool, enumOf, integer, str, stringList } from "./common.js";

const LAUNCH_SOURCES = ["launch_configuration", "launch_template", "mixed_instances_policy"];

export const TERMINATION_POLICIES = [
  "OldestInstance",
  "NewestInstance",
  "OldestLaunchConfiguration",
  "OldestLaunchTemplate",
  "ClosestToNextInstanceHour",
  "Default",
  "AllocationStrategy",
] as const;

const launchTemplateSpecification = defineSchema("aws_autoscaling_group.launch_template", {
  id: optional(str),
  name: optional(str),
  version: defaulted(str, "$Latest"),
}).withInvariants([exactlyOneOf(["id", "name"], "launch_template must specify either id or name")]);

const instanceRefreshPreferences = defineSchema("aws_autoscaling_group.instance_refresh", {
  strategy: defaulted(enumOf(["Rolling"]), "Rolling"),
  min_healthy_percentage: defaulted(integer({ min: 0, max: 100 }), 90),
  instance_warmup: optional(integer({ min: 0 })),
  checkpoint_percentages: defaulted(arrayOf(integer({ min: 1, max: 100 })), []),
  checkpoint_delay: optional(integer({ min: 0 })),
});

const autoScalingTag = defineSchema("aws_autoscaling_group.tag", {
  key: required(str),
  value: required(str),
  propagate_at_launch: defaulted(bool, true),
});

export const autoscalingGroupSchema = defineSchema("aws_autoscaling_group", {
  min_size: required(integer({ min: 0 })),
  max_size: required(integer({ min: 0 })),
  desired_capacity: optional(integer({ min: 0 })),
  default_cooldown: defaulted(integer({ min: 0 }), 300),
  launch_configuration: optional(str),
  launch_template: optional(nested(launchTemplateSpecification)),
  mixed_instances_policy: optional(value(z.record(z.unknown()))),
  vpc_zone_identifier: defaulted(stringList, []),
  availability_zones: defaulted(stringList, []),
  health_check_type: defaulted(enumOf(["EC2", "ELB"]), "EC2"),
  health_check_grace_period: defaulted(integer({ min: 0 }), 300),
  termination_policies: defaulted(arrayOf(enumOf(TERMINATION_POLICIES)), []),
  enabled_metrics: defaulted(stringList, []),
  metrics_granularity: defaulted(enumOf(["1Minute"]), "1Minute"),
  wait_for_capacity_timeout: defaulted(str, "10m"),
  min_elb_capacity: optional(integer({ min: 0 })),
  protect_from_scale_in: defaulted(bool, false),
  service_linked_role_arn: optional(str),
  max_instance_lifetime: optional(integer({ min: 0 })),
  capacity_rebalance: defaulted(bool, false),
  target_group_arns: defaulted(stringList, []),
  load_balancers: defaulted(stringList, []),
  tags: defaulted(arrayOf(nested(autoScalingTag)), []),
  instance_refresh: optional(nested(instanceRefreshPreferences)),
})
  .withInvariants([
    ordered("min_size", "max_size"),
    between("desired_capacity", "min_size", "max_size"),
    anyOf(
      LAUNCH_SOURCES,
      "Auto Scaling Group must specify one of: " +
        "launch_configuration, launch_template, or mixed_instances_policy",
    ),
    atMostOneOf(
      LAUNCH_SOURCES,
      "Auto Scaling Group can only specify one of: " +
        "launch_configuration, launch_template, or mixed_instances_policy",
    ),
    invariant(
      "network_required",
      (attrs) => attrs.vpc_zone_identifier.length > 0 || attrs.availability_zones.length > 0,
      "Auto Scaling Group must specify either vpc_zone_identifier or availability_zones",
    ),
  ])
  .withDerived((attrs) => ({
    usesLaunchTemplate: attrs.launch_template !== undefined,
    usesMixedInstances: attrs.mixed_instances_policy !== undefined,
    usesTargetGroups: attrs.target_group_arns.length > 0,
    usesClassicLoadBalancers: attrs.load_balancers.length > 0,
  }));

export type AutoscalingGroup = ValidatedOf<typeof autoscalingGroupSchema>;

export const autoscalingGroup = defineResourceType({
  type: "aws_autoscaling_group",
  schema: autoscalingGroupSchema,
  outputs: [
    "name",
    "min_size",
    "max_size",
    "desired_capacity",
    "default_cooldown",
    "availability_zones",
    "load_balancers",
    "target_group_arns",
    "health_check_type",
    "health_check_grace_period",
    "vpc_zone_identifier",
  ],
  render: ({ attributes: asg }, b) => {
    b.set("min_size", asg.min_size)
      .set("max_size", asg.max_size)
      .setIfPresent("desired_capacity", asg.desired_capacity);
    if (asg.default_cooldown !== 300) {
      b.set("default_cooldown", asg.default_cooldown);
    }

    const template = asg.launch_template;
    if (asg.launch_configuration !== undefined) {
      b.set("launch_configuration", asg.launch_configuration);
    } else if (template !== undefined) {
      b.block("launch_template", (lt) =>
        lt
          .setIfPresent("id", template.id)
          .setIfPresent("name", template.name)
          .set("version", template.version),
      );
    } else if (asg.mixed_instances_policy !== undefined) {
      b.attributes({ mixed_instances_policy: asg.mixed_instances_policy });
    }

    if (asg.vpc_zone_identifier.length > 0) b.set("vpc_zone_identifier", asg.vpc_zone_identifier);
    if (asg.availability_zones.length > 0) b.set("availability_zones", asg.availability_zones);
    b.set("health_check_type", asg.health_check_type)
      .set("health_check_grace_period", asg.health_check_grace_period);
    if (asg.termination_policies.length > 0) {
      b.set("termination_policies", asg.termination_policies);
    }
    if (asg.enabled_metrics.length > 0) {
      b.set("enabled_metrics", asg.enabled_metrics)
        .set("metrics_granularity", asg.metrics_granularity);
    }

    b.set("wait_for_capacity_timeout", asg.wait_for_capacity_timeout)
      .setIfPresent("min_elb_capacity", asg.min_elb_capacity)
      .setIfPresent("service_linked_role_arn", asg.service_linked_role_arn)
      .setIfPresent("max_instance_lifetime", asg.max_instance_lifetime);
    if (asg.protect_from_scale_in) b.set("protect_from_scale_in", true);
    if (asg.capacity_rebalance) b.set("capacity_rebalance", true);

    if (asg.target_group_arns.length > 0) b.set("target_group_arns", asg.target_group_arns);
    if (asg.load_balancers.length > 0) b.set("load_balancers", asg.load_balancers);

    for (const tag of asg.tags) {
      b.block("tag", (t) =>
        t
          .set("key", tag.key)
          .set("value", tag.value)
          .set("propagate_at_launch", tag.propagate_at_launch),
      );
    }

    const refresh = asg.instance_refresh;
    if (refresh !== undefined) {
      b.block("instance_refresh", (ir) =>
        ir.set("strategy", refresh.strategy).block("preferences", (p) => {
          p.set("min_healthy_percentage", refresh.min_healthy_percentage)
            .setIfPresent("instance_warmup", refresh.instance_warmup)
            .setIfPresent("checkpoint_delay", refresh.checkpoint_delay);
          if (refresh.checkpoint_percentages.length > 0) {
            p.set("checkpoint_percentages", refresh.checkpoint_percentages);
          }
        }),
      );
    }
  },
});

export const awsAutoscalingGroup = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(autoscalingGroup, name, attributes);
