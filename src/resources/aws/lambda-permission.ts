import { z } from "zod";
import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { computed, optional, required, value } from "../../schema/field.js";
import { forbiddenUnless } from "../../schema/invariants.js";
import { ACCOUNT_ID_PATTERN, ARN_PATTERN, enumOf, str } from "./common.js";

export const LAMBDA_ACTIONS = [
  "lambda:InvokeFunction",
  "lambda:InvokeFunctionUrl",
  "lambda:GetFunction",
  "lambda:GetFunctionConfiguration",
  "lambda:UpdateFunctionConfiguration",
  "lambda:UpdateFunctionCode",
  "lambda:DeleteFunction",
  "lambda:PublishVersion",
  "lambda:CreateAlias",
  "lambda:UpdateAlias",
  "lambda:DeleteAlias",
  "lambda:GetAlias",
  "lambda:*",
] as const;

export const SERVICE_PRINCIPALS: readonly string[] = [
  "apigateway.amazonaws.com",
  "events.amazonaws.com",
  "s3.amazonaws.com",
  "sns.amazonaws.com",
  "sqs.amazonaws.com",
  "logs.amazonaws.com",
  "cognito-idp.amazonaws.com",
  "elasticloadbalancing.amazonaws.com",
  "lambda.alb.amazonaws.com",
  "iot.amazonaws.com",
  "lex.amazonaws.com",
  "states.amazonaws.com",
  "kafka.amazonaws.com",
  "config.amazonaws.com",
  "backup.amazonaws.com",
  "datasync.amazonaws.com",
  "mediaconvert.amazonaws.com",
  "secretsmanager.amazonaws.com",
  "scheduler.amazonaws.com",
  "cloudformation.amazonaws.com",
];

export const ALB_PRINCIPAL = "lambda.alb.amazonaws.com";

const IAM_PRINCIPAL = /^arn:aws[a-zA-Z-]*:iam::\d{12}:(root|user\/.+|role\/.+)$/;

const isServicePrincipal = (principal: string): boolean => principal.endsWith(".amazonaws.com");

const principal = value(
  z.string().superRefine((candidate, ctx) => {
    if (isServicePrincipal(candidate)) {
      if (!SERVICE_PRINCIPALS.includes(candidate)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown AWS service principal: ${candidate}`,
        });
      }
      return;
    }
    if (candidate === "*" || ACCOUNT_ID_PATTERN.test(candidate) || IAM_PRINCIPAL.test(candidate)) {
      return;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "Principal must be an AWS service principal, " +
        "a 12-digit account ID, an IAM ARN, or '*'",
    });
  }),
);

const statementId = value(
  z
    .string()
    .min(1, "statement_id must not be empty")
    .max(100, "statement_id cannot exceed 100 characters")
    .regex(
      /^[A-Za-z0-9_-]+$/,
      "statement_id must contain only alphanumeric characters, hyphens, and underscores",
    ),
);

export const lambdaPermissionSchema = defineSchema("aws_lambda_permission", {
  action: required(enumOf(LAMBDA_ACTIONS)),
  function_name: required(str),
  principal: required(principal),
  statement_id: computed(
    statementId,
    (_siblings, context) => `AllowExecutionFrom${Math.floor(context.now().getTime() / 1000)}`,
  ),
  source_arn: optional(value(z.string().regex(ARN_PATTERN, "source_arn must be a valid AWS ARN"))),
  source_account: optional(
    value(z.string().regex(ACCOUNT_ID_PATTERN, "source_account must be a 12-digit AWS account ID")),
  ),
  qualifier: optional(str),
  event_source_token: optional(str),
  principal_org_id: optional(str),
  function_url_auth_type: optional(enumOf(["AWS_IAM", "NONE"])),
})
  .withInvariants([
    forbiddenUnless(
      "function_url_auth_type",
      (attrs) => attrs.principal === ALB_PRINCIPAL,
      `function_url_auth_type can only be used with ALB principal (${ALB_PRINCIPAL})`,
    ),
  ])
  .withDerived((attrs) => {
    const service = isServicePrincipal(attrs.principal);
    return {
      isServicePrincipal: service,
      serviceName: service ? attrs.principal.split(".")[0] : undefined,
      isCrossAccount: !service || attrs.principal_org_id !== undefined,
      allowsAllActions: attrs.action === "lambda:*",
      requiresSourceArn: service && attrs.principal !== ALB_PRINCIPAL,
    };
  });

export type LambdaPermission = ValidatedOf<typeof lambdaPermissionSchema>;

export const lambdaPermission = defineResourceType({
  type: "aws_lambda_permission",
  schema: lambdaPermissionSchema,
  outputs: ["statement_id", "function_name", "principal", "source_arn", "qualifier"],
  render: ({ attributes: permission }, b) => {
    b.set("action", permission.action)
      .set("function_name", permission.function_name)
      .set("principal", permission.principal)
      .set("statement_id", permission.statement_id)
      .setIfPresent("source_arn", permission.source_arn)
      .setIfPresent("source_account", permission.source_account)
      .setIfPresent("qualifier", permission.qualifier)
      .setIfPresent("event_source_token", permission.event_source_token)
      .setIfPresent("principal_org_id", permission.principal_org_id)
      .setIfPresent("function_url_auth_type", permission.function_url_auth_type);
  },
});

export const awsLambdaPermission = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(lambdaPermission, name, attributes);
