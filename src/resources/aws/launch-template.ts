import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { arrayOf, defaulted, optional, required } from "../../schema/field.js";
import { atMostOneOf } from "../../schema/invariants.js";
import { nested } from "../../schema/validate.js";
import { bool, enumOf, integer, renderTags, str, stringList, tags } from "./common.js";

export const VOLUME_TYPES = ["standard", "gp2", "gp3", "io1", "io2", "sc1", "st1"] as const;

export const TAGGABLE_RESOURCE_TYPES = [
  "instance",
  "volume",
  "elastic-gpu",
  "spot-instances-request",
  "network-interface",
] as const;

const ebs = defineSchema("aws_launch_template.ebs", {
  delete_on_termination: defaulted(bool, true),
  encrypted: defaulted(bool, false),
  iops: optional(integer({ min: 0 })),
  kms_key_id: optional(str),
  snapshot_id: optional(str),
  throughput: optional(integer({ min: 0 })),
  volume_size: optional(integer({ min: 1 })),
  volume_type: defaulted(enumOf(VOLUME_TYPES), "gp3"),
});

const blockDeviceMapping = defineSchema("aws_launch_template.block_device_mapping", {
  device_name: required(str),
  no_device: optional(str),
  virtual_name: optional(str),
  ebs: optional(nested(ebs)),
});

const networkInterface = defineSchema("aws_launch_template.network_interface", {
  associate_public_ip_address: optional(bool),
  delete_on_termination: defaulted(bool, true),
  description: optional(str),
  device_index: defaulted(integer({ min: 0 }), 0),
  groups: defaulted(stringList, []),
  network_interface_id: optional(str),
  private_ip_address: optional(str),
  subnet_id: optional(str),
});

const tagSpecification = defineSchema("aws_launch_template.tag_specification", {
  resource_type: required(enumOf(TAGGABLE_RESOURCE_TYPES)),
  tags: defaulted(tags, {}),
});

const iamInstanceProfile = defineSchema("aws_launch_template.iam_instance_profile", {
  arn: optional(str),
  name: optional(str),
}).withInvariants([
  atMostOneOf(["arn", "name"], "iam_instance_profile cannot specify both arn and name"),
]);

const instanceMonitoring = defineSchema("aws_launch_template.monitoring", {
  enabled: required(bool),
});

const launchTemplateData = defineSchema("aws_launch_template.launch_template_data", {
  image_id: optional(str),
  instance_type: optional(str),
  key_name: optional(str),
  user_data: optional(str),
  security_group_ids: defaulted(stringList, []),
  vpc_security_group_ids: defaulted(stringList, []),
  iam_instance_profile: optional(nested(iamInstanceProfile)),
  instance_initiated_shutdown_behavior: defaulted(enumOf(["stop", "terminate"]), "stop"),
  disable_api_termination: defaulted(bool, false),
  monitoring: optional(nested(instanceMonitoring)),
  block_device_mappings: defaulted(arrayOf(nested(blockDeviceMapping)), []),
  network_interfaces: defaulted(arrayOf(nested(networkInterface)), []),
  tag_specifications: defaulted(arrayOf(nested(tagSpecification)), []),
});

export const launchTemplateSchema = defineSchema("aws_launch_template", {
  name: optional(str),
  name_prefix: optional(str),
  description: optional(str),
  launch_template_data: optional(nested(launchTemplateData)),
  tags: defaulted(tags, {}),
})
  .withInvariants([
    atMostOneOf(["name", "name_prefix"], "Cannot specify both name and name_prefix"),
  ])
  .withDerived((attrs) => ({
    blockDeviceCount: attrs.launch_template_data?.block_device_mappings.length ?? 0,
    networkInterfaceCount: attrs.launch_template_data?.network_interfaces.length ?? 0,
    hasUserData: attrs.launch_template_data?.user_data !== undefined,
  }));

export type LaunchTemplate = ValidatedOf<typeof launchTemplateSchema>;

export const launchTemplate = defineResourceType({
  type: "aws_launch_template",
  schema: launchTemplateSchema,
  outputs: ["latest_version", "default_version", "name"],
  render: ({ attributes: lt }, b) => {
    if (lt.name !== undefined) {
      b.set("name", lt.name);
    } else if (lt.name_prefix !== undefined) {
      b.set("name_prefix", lt.name_prefix);
    }
    b.setIfPresent("description", lt.description);

    const data = lt.launch_template_data;
    if (data !== undefined) {
      b.block("launch_template_data", (d) => {
        d.setIfPresent("image_id", data.image_id)
          .setIfPresent("instance_type", data.instance_type)
          .setIfPresent("key_name", data.key_name)
          .setIfPresent("user_data", data.user_data);
        if (data.security_group_ids.length > 0) {
          d.set("security_group_ids", data.security_group_ids);
        }
        if (data.vpc_security_group_ids.length > 0) {
          d.set("vpc_security_group_ids", data.vpc_security_group_ids);
        }

        const profile = data.iam_instance_profile;
        if (profile !== undefined) {
          d.block("iam_instance_profile", (p) =>
            p.setIfPresent("arn", profile.arn).setIfPresent("name", profile.name),
          );
        }
        if (data.instance_initiated_shutdown_behavior !== "stop") {
          d.set("instance_initiated_shutdown_behavior", data.instance_initiated_shutdown_behavior);
        }
        if (data.disable_api_termination) d.set("disable_api_termination", true);

        const monitoring = data.monitoring;
        if (monitoring !== undefined) {
          d.block("monitoring", (m) => m.set("enabled", monitoring.enabled));
        }

        for (const mapping of data.block_device_mappings) {
          d.block("block_device_mappings", (bdm) => {
            bdm
              .set("device_name", mapping.device_name)
              .setIfPresent("no_device", mapping.no_device)
              .setIfPresent("virtual_name", mapping.virtual_name);
            const volume = mapping.ebs;
            if (volume !== undefined) {
              bdm.block("ebs", (e) =>
                e
                  .set("delete_on_termination", volume.delete_on_termination)
                  .set("encrypted", volume.encrypted)
                  .setIfPresent("iops", volume.iops)
                  .setIfPresent("kms_key_id", volume.kms_key_id)
                  .setIfPresent("snapshot_id", volume.snapshot_id)
                  .setIfPresent("throughput", volume.throughput)
                  .setIfPresent("volume_size", volume.volume_size)
                  .set("volume_type", volume.volume_type),
              );
            }
          });
        }

        for (const ni of data.network_interfaces) {
          d.block("network_interfaces", (n) => {
            n.setIfPresent("associate_public_ip_address", ni.associate_public_ip_address);
            if (!ni.delete_on_termination) n.set("delete_on_termination", false);
            n.setIfPresent("description", ni.description).set("device_index", ni.device_index);
            if (ni.groups.length > 0) n.set("groups", ni.groups);
            n.setIfPresent("network_interface_id", ni.network_interface_id)
              .setIfPresent("private_ip_address", ni.private_ip_address)
              .setIfPresent("subnet_id", ni.subnet_id);
          });
        }

        for (const spec of data.tag_specifications) {
          d.block("tag_specifications", (ts) => {
            ts.set("resource_type", spec.resource_type);
            renderTags(ts, spec.tags);
          });
        }
      });
    }

    renderTags(b, lt.tags);
  },
});

export const awsLaunchTemplate = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(launchTemplate, name, attributes);
