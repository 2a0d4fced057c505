import { z } from "zod";
import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { defaulted, optional, required, value } from "../../schema/field.js";
import { forbiddenUnless, requiredWhen } from "../../schema/invariants.js";
import { nested } from "../../schema/validate.js";
import { bool, enumOf, renderTags, str, tags } from "./common.js";

const repositoryName = z
  .string({ invalid_type_error: "must be a string" })
  .min(2, "Repository name must be between 2 and 256 characters")
  .max(256, "Repository name must be between 2 and 256 characters")
  .regex(
    /^[a-z0-9._/-]+$/,
    "Repository name must contain only lowercase letters, numbers, " +
      "hyphens, underscores, periods, and forward slashes",
  )
  .refine(
    (name) => !name.startsWith("-") && !name.endsWith("-"),
    "Repository name cannot start or end with hyphens",
  );

const imageScanningConfiguration = defineSchema("aws_ecr_repository.image_scanning_configuration", {
  scan_on_push: defaulted(bool, false),
});

const encryptionConfiguration = defineSchema("aws_ecr_repository.encryption_configuration", {
  encryption_type: required(enumOf(["AES256", "KMS"])),
  kms_key: optional(str),
}).withInvariants([
  requiredWhen(
    "kms_key",
    (attrs) => attrs.encryption_type === "KMS",
    "kms_key is required when encryption_type is KMS",
  ),
  forbiddenUnless(
    "kms_key",
    (attrs) => attrs.encryption_type === "KMS",
    "kms_key can only be specified when encryption_type is KMS",
  ),
]);

export const ecrRepositorySchema = defineSchema("aws_ecr_repository", {
  name: required(value(repositoryName)),
  image_tag_mutability: defaulted(enumOf(["MUTABLE", "IMMUTABLE"]), "MUTABLE"),
  image_scanning_configuration: defaulted(nested(imageScanningConfiguration), {
    scan_on_push: false,
  }),
  encryption_configuration: optional(nested(encryptionConfiguration)),
  force_delete: defaulted(bool, false),
  tags: defaulted(tags, {}),
}).withDerived((attrs) => ({
  isImmutable: attrs.image_tag_mutability === "IMMUTABLE",
  scanOnPushEnabled: attrs.image_scanning_configuration.scan_on_push,
  usesKmsEncryption: attrs.encryption_configuration?.encryption_type === "KMS",
  usesAes256Encryption: attrs.encryption_configuration?.encryption_type === "AES256",
  allowsForceDelete: attrs.force_delete,
  repositoryUriTemplate: "${aws_ecr_repository.%{name}.repository_url}",
  registryIdTemplate: "${aws_ecr_repository.%{name}.registry_id}",
}));

export type EcrRepository = ValidatedOf<typeof ecrRepositorySchema>;

export const ecrRepository = defineResourceType({
  type: "aws_ecr_repository",
  schema: ecrRepositorySchema,
  outputs: ["name", "registry_id", "repository_url", "tags_all"],
  render: ({ attributes: repo, derived }, b) => {
    b.set("name", repo.name)
      .set("image_tag_mutability", repo.image_tag_mutability)
      .block("image_scanning_configuration", (scan) =>
        scan.set("scan_on_push", derived.scanOnPushEnabled),
      );

    const encryption = repo.encryption_configuration;
    if (encryption !== undefined) {
      b.block("encryption_configuration", (enc) =>
        enc
          .set("encryption_type", encryption.encryption_type)
          .setIfPresent("kms_key", encryption.kms_key),
      );
    }

    b.set("force_delete", repo.force_delete);
    renderTags(b, repo.tags);
  },
});

export const awsEcrRepository = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(ecrRepository, name, attributes);
