import { z } from "zod";
import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { defaulted, optional, recordOf, required, value } from "../../schema/field.js";
import { invariant, requiredWhen } from "../../schema/invariants.js";
import { HTTP_METHODS } from "./api-gateway-method.js";
import { enumOf, str, stringList } from "./common.js";

export const INTEGRATION_TYPES = ["MOCK", "HTTP", "HTTP_PROXY", "AWS", "AWS_PROXY"] as const;

const PARAMETER_LOCATION = "(path|querystring|header|multivalueheader|multivaluequerystring)";
const INTEGRATION_PARAMETER = new RegExp(`^integration\\.request\\.${PARAMETER_LOCATION}\\..+`);
const METHOD_PARAMETER_SOURCE = new RegExp(
  `^(method\\.request\\.${PARAMETER_LOCATION}\\..+|'[^']*'|context\\..+|stageVariables\\..+)$`,
);

const LAMBDA_FUNCTION = /function:([^/:]+)/;

const findInvalid = (
  entries: Readonly<Record<string, string>>,
  isValid: (key: string, source: string) => boolean,
): readonly [string, string] | undefined =>
  Object.entries(entries).find(([key, source]) => !isValid(key, source));

const invalidParameterName = (parameters: Readonly<Record<string, string>>): string | undefined =>
  findInvalid(parameters, (key) => INTEGRATION_PARAMETER.test(key))?.[0];

const invalidParameterSource = (parameters: Readonly<Record<string, string>>): string | undefined =>
  findInvalid(parameters, (_key, source) => METHOD_PARAMETER_SOURCE.test(source))?.[1];

export const apiGatewayIntegrationSchema = defineSchema("aws_api_gateway_integration", {
  rest_api_id: required(str),
  resource_id: required(str),
  http_method: required(enumOf(HTTP_METHODS)),
  type: required(enumOf(INTEGRATION_TYPES)),
  integration_http_method: optional(enumOf(HTTP_METHODS)),
  uri: optional(str),
  connection_type: defaulted(enumOf(["INTERNET", "VPC_LINK"]), "INTERNET"),
  connection_id: optional(str),
  credentials: optional(str),
  cache_key_parameters: defaulted(stringList, []),
  cache_namespace: optional(str),
  request_templates: defaulted(recordOf(str), {}),
  request_parameters: defaulted(recordOf(str), {}),
  passthrough_behavior: defaulted(
    enumOf(["WHEN_NO_MATCH", "WHEN_NO_TEMPLATES", "NEVER"]),
    "WHEN_NO_MATCH",
  ),
  content_handling: optional(
    enumOf(
      ["CONVERT_TO_BINARY", "CONVERT_TO_TEXT"],
      "content_handling must be CONVERT_TO_BINARY or CONVERT_TO_TEXT",
    ),
  ),
  timeout_milliseconds: defaulted(
    value(
      z
        .number({ invalid_type_error: "must be an integer" })
        .int("must be an integer")
        .min(50, "timeout_milliseconds must be between 50 and 29000")
        .max(29000, "timeout_milliseconds must be between 50 and 29000"),
    ),
    29000,
  ),
})
  .withInvariants([
    requiredWhen(
      "uri",
      (attrs) => attrs.type !== "MOCK",
      (attrs) => `uri is required for ${attrs.type} integration type`,
    ),
    requiredWhen(
      "integration_http_method",
      (attrs) => attrs.type === "HTTP" || attrs.type === "AWS",
      (attrs) => `integration_http_method is required for ${attrs.type} integration type`,
    ),
    requiredWhen(
      "connection_id",
      (attrs) => attrs.connection_type === "VPC_LINK",
      "connection_id is required when connection_type is VPC_LINK",
    ),
    invariant(
      "integration_parameter_format",
      (attrs) => invalidParameterName(attrs.request_parameters) === undefined,
      (attrs) => {
        const name = invalidParameterName(attrs.request_parameters);
        return (
          `Invalid integration parameter format: ${name}. ` +
          "Expected format: integration.request.{location}.{name}"
        );
      },
    ),
    invariant(
      "method_parameter_reference",
      (attrs) => invalidParameterSource(attrs.request_parameters) === undefined,
      (attrs) =>
        `Invalid method parameter reference: ${invalidParameterSource(attrs.request_parameters)}`,
    ),
  ])
  .withDerived((attrs) => {
    const uri = attrs.uri ?? "";
    const isLambda = uri.includes(":lambda:path");
    return {
      isProxy: attrs.type === "AWS_PROXY" || attrs.type === "HTTP_PROXY",
      isLambda,
      isHttp: attrs.type === "HTTP" || attrs.type === "HTTP_PROXY",
      isAwsService: attrs.type === "AWS" && !isLambda,
      isMock: attrs.type === "MOCK",
      usesVpcLink: attrs.connection_type === "VPC_LINK",
      hasCaching: attrs.cache_key_parameters.length > 0,
      requiresIamRole: attrs.type === "AWS" && !isLambda,
      lambdaFunctionName: isLambda ? LAMBDA_FUNCTION.exec(uri)?.[1] : undefined,
      awsServiceName: attrs.type === "AWS" && !isLambda ? uri.split(":")[4] : undefined,
      timeoutSeconds: attrs.timeout_milliseconds / 1000,
    };
  });

export type ApiGatewayIntegration = ValidatedOf<typeof apiGatewayIntegrationSchema>;

export const apiGatewayIntegration = defineResourceType({
  type: "aws_api_gateway_integration",
  schema: apiGatewayIntegrationSchema,
  outputs: [
    "rest_api_id",
    "resource_id",
    "http_method",
    "type",
    "integration_http_method",
    "uri",
    "connection_type",
    "connection_id",
    "credentials",
    "cache_key_parameters",
    "cache_namespace",
    "request_parameters",
    "request_templates",
    "passthrough_behavior",
    "content_handling",
    "timeout_milliseconds",
  ],
  render: ({ attributes: integration }, b) => {
    b.set("rest_api_id", integration.rest_api_id)
      .set("resource_id", integration.resource_id)
      .set("http_method", integration.http_method)
      .set("type", integration.type)
      .setIfPresent("integration_http_method", integration.integration_http_method)
      .setIfPresent("uri", integration.uri)
      .set("connection_type", integration.connection_type)
      .setIfPresent("connection_id", integration.connection_id)
      .setIfPresent("credentials", integration.credentials);
    if (integration.cache_key_parameters.length > 0) {
      b.set("cache_key_parameters", integration.cache_key_parameters);
    }
    b.setIfPresent("cache_namespace", integration.cache_namespace);
    if (Object.keys(integration.request_templates).length > 0) {
      b.block("request_templates", (t) => t.attributes(integration.request_templates));
    }
    if (Object.keys(integration.request_parameters).length > 0) {
      b.block("request_parameters", (p) => p.attributes(integration.request_parameters));
    }
    b.set("passthrough_behavior", integration.passthrough_behavior)
      .setIfPresent("content_handling", integration.content_handling)
      .set("timeout_milliseconds", integration.timeout_milliseconds);
  },
});

export const awsApiGatewayIntegration = (
  session: Session,
  name: string,
  attributes: AttributeInput,
) => session.declare(apiGatewayIntegration, name, attributes);
