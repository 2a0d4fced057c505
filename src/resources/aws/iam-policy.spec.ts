import { describe, expect, test } from "vitest";
import { validate } from "../../schema/validate.js";
import { Testing } from "../../testing/index.js";
import { allowsAction, awsIamPolicy, iamPolicySchema, securityWarnings } from "./iam-policy.js";

const readOnly = {
  name: "s3-read",
  policy: {
    Statement: [{ Effect: "Allow", Action: "s3:GetObject", Resource: "arn:aws:s3:::app-bucket/*" }],
  },
};

const admin = {
  name: "admin",
  policy: { Statement: [{ Effect: "Allow", Action: "*", Resource: "*" }] },
};

const errorOf = (raw: Record<string, unknown>) =>
  validate(iamPolicySchema, raw)._unsafeUnwrapErr().message;

describe("aws_iam_policy attributes", () => {
  test("applies defaults and derives a low risk level", () => {
    const { attributes, derived } = validate(iamPolicySchema, readOnly)._unsafeUnwrap();

    expect(attributes.path).toBe("/");
    expect(attributes.policy.Version).toBe("2012-10-17");
    expect(derived.allActions).toEqual(["s3:GetObject"]);
    expect(derived.allResources).toEqual(["arn:aws:s3:::app-bucket/*"]);
    expect(derived.hasWildcardPermissions).toBe(false);
    expect(derived.securityLevel).toBe("low_risk");
    expect(derived.complexityScore).toBe(3);
    expect(derived.serviceRolePolicy).toBe(false);
    expect(derived.usesReservedName).toBe(false);
  });

  test("wildcards are high risk", () => {
    const { derived } = validate(iamPolicySchema, admin)._unsafeUnwrap();
    expect(derived.hasWildcardPermissions).toBe(true);
    expect(derived.securityLevel).toBe("high_risk");
  });

  test("wildcards inside action and resource lists count too", () => {
    const { derived } = validate(iamPolicySchema, {
      name: "listed",
      policy: {
        Statement: [
          { Effect: "Allow", Action: ["s3:GetObject", "*"], Resource: ["arn:aws:s3:::logs"] },
        ],
      },
    })._unsafeUnwrap();
    expect(derived.hasWildcardPermissions).toBe(true);
    expect(derived.securityLevel).toBe("high_risk");
  });

  test("role assumption is medium risk", () => {
    const { derived } = validate(iamPolicySchema, {
      name: "assume-deployer",
      policy: {
        Statement: [
          {
            Effect: "Allow",
            Action: ["sts:AssumeRole"],
            Resource: "arn:aws:iam::123456789012:role/deployer",
            Condition: { StringEquals: { "aws:PrincipalTag/Team": "platform" } },
          },
        ],
      },
    })._unsafeUnwrap();

    expect(derived.securityLevel).toBe("medium_risk");
    expect(derived.serviceRolePolicy).toBe(true);
    expect(derived.complexityScore).toBe(5);
  });

  test("deduplicates actions across statements", () => {
    const { derived } = validate(iamPolicySchema, {
      name: "dup",
      policy: {
        Statement: [
          { Effect: "Allow", Action: ["s3:GetObject", "s3:ListBucket"], Resource: "*" },
          { Effect: "Deny", Action: "s3:GetObject", Resource: "arn:aws:s3:::secret/*" },
        ],
      },
    })._unsafeUnwrap();
    expect(derived.allActions).toEqual(["s3:GetObject", "s3:ListBucket"]);
  });

  test("flags names that look reserved", () => {
    const { derived } = validate(iamPolicySchema, {
      ...readOnly,
      name: "AWSCustomRead",
    })._unsafeUnwrap();
    expect(derived.usesReservedName).toBe(true);
  });

  test("requires at least one statement", () => {
    expect(errorOf({ name: "empty", policy: { Statement: [] } })).toBe(
      "policy.Statement: Policy document must have at least one statement",
    );
  });

  test("statements need an effect", () => {
    expect(
      errorOf({ name: "bad", policy: { Statement: [{ Action: "s3:*", Resource: "*" }] } }),
    ).toBe("policy.Statement[0].Effect is required");
  });

  test("limits the name length", () => {
    expect(errorOf({ ...readOnly, name: "p".repeat(129) })).toBe(
      "name: Policy name cannot exceed 128 characters",
    );
  });

  test("validates the path format", () => {
    expect(errorOf({ ...readOnly, path: "service" })).toBe(
      "path: Path must start and end with '/' and contain only valid characters",
    );
  });

  test("limits the policy size", () => {
    const resources = Array.from({ length: 300 }, (_, i) => `arn:aws:s3:::bucket-${i}/*`);
    const statement = { Effect: "Allow", Action: "s3:GetObject", Resource: resources };
    expect(errorOf({ name: "large", policy: { Statement: [statement] } })).toBe(
      "Policy document cannot exceed 6144 characters",
    );
  });
});

describe("allowsAction", () => {
  const { attributes } = validate(iamPolicySchema, {
    name: "s3",
    policy: {
      Statement: [
        { Effect: "Allow", Action: "s3:*", Resource: "*" },
        { Effect: "Deny", Action: "ec2:*", Resource: "*" },
      ],
    },
  })._unsafeUnwrap();

  test("matches trailing wildcards", () => {
    expect(allowsAction(attributes.policy, "s3:GetObject")).toBe(true);
  });

  test("matches wildcards inside action lists", () => {
    const { attributes } = validate(iamPolicySchema, {
      name: "iam-admin",
      policy: {
        Statement: [{ Effect: "Allow", Action: ["s3:GetObject", "iam:*"], Resource: "*" }],
      },
    })._unsafeUnwrap();
    expect(allowsAction(attributes.policy, "iam:CreateRole")).toBe(true);
    expect(allowsAction(attributes.policy, "sts:AssumeRole")).toBe(false);
  });

  test("ignores deny statements", () => {
    expect(allowsAction(attributes.policy, "ec2:RunInstances")).toBe(false);
  });
});

describe("securityWarnings", () => {
  test("lists every finding for an admin policy", () => {
    expect(securityWarnings(validate(iamPolicySchema, admin)._unsafeUnwrap())).toEqual([
      "Policy contains wildcard (*) permissions - consider principle of least privilege",
      "Policy allows potentially dangerous action: iam:*",
      "Policy allows potentially dangerous action: iam:CreateRole",
      "Policy allows potentially dangerous action: iam:AttachRolePolicy",
      "Policy allows potentially dangerous action: iam:PutRolePolicy",
      "Policy grants access to root resources - review necessity",
    ]);
  });

  test("is empty for a scoped policy", () => {
    expect(securityWarnings(validate(iamPolicySchema, readOnly)._unsafeUnwrap())).toEqual([]);
  });
});

describe("awsIamPolicy", () => {
  test("renders the policy document as a JSON string", () => {
    const session = Testing.session();
    awsIamPolicy(session, "read", { ...readOnly, description: "Read objects" });

    expect(Testing.synth(session).resource?.["aws_iam_policy"]).toEqual({
      read: {
        name: "s3-read",
        path: "/",
        description: "Read objects",
        policy:
          '{"Version":"2012-10-17","Statement":[{"Effect":"Allow","Action":"s3:GetObject",' +
          '"Resource":"arn:aws:s3:::app-bucket/*"}]}',
      },
    });
  });

  test("records security warnings on the session", () => {
    const session = Testing.session();
    awsIamPolicy(session, "admin", admin);

    const warnings = session.annotations.filter((a) => a.level === "warning");
    expect(warnings).toHaveLength(6);
    expect(warnings[0]).toEqual({
      level: "warning",
      path: ["resource", "aws_iam_policy", "admin"],
      message: "Policy contains wildcard (*) permissions - consider principle of least privilege",
    });
  });

  test("exposes policy outputs", () => {
    const policy = awsIamPolicy(Testing.session(), "read", readOnly);
    expect(policy.arn).toBe("${aws_iam_policy.read.arn}");
    expect(policy.outputs["policy_id"]).toBe("${aws_iam_policy.read.policy_id}");
  });
});
