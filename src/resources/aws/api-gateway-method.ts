import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { defaulted, optional, recordOf, required } from "../../schema/field.js";
import { forbiddenUnless, invariant, requiredWhen } from "../../schema/invariants.js";
import { bool, enumOf, str, stringList } from "./common.js";

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
  "OPTIONS",
  "HEAD",
  "PATCH",
  "ANY",
] as const;

export const PARAMETER_LOCATIONS = [
  "path",
  "querystring",
  "header",
  "multivalueheader",
  "multivaluequerystring",
] as const;

export type ParameterLocation = (typeof PARAMETER_LOCATIONS)[number];

const REQUEST_PARAMETER =
  /^method\.request\.(path|querystring|header|multivalueheader|multivaluequerystring)\..+/;
const CONTENT_TYPE = /^[\w\-+]+\/[\w\-+.]+$/;

const AUTHORIZER_TYPES: readonly string[] = ["CUSTOM", "COGNITO_USER_POOLS"];

/** `method.request.<location>.<name>` paired with whether it is required. */
export const buildRequestParameter = (
  location: ParameterLocation,
  name: string,
  isRequired = false,
): readonly [string, boolean] => [`method.request.${location}.${name}`, isRequired];

export const apiGatewayMethodSchema = defineSchema("aws_api_gateway_method", {
  rest_api_id: required(str),
  resource_id: required(str),
  http_method: required(enumOf(HTTP_METHODS)),
  authorization: defaulted(enumOf(["NONE", "AWS_IAM", "CUSTOM", "COGNITO_USER_POOLS"]), "NONE"),
  authorizer_id: optional(str),
  authorization_scopes: defaulted(stringList, []),
  api_key_required: defaulted(bool, false),
  request_parameters: defaulted(recordOf(bool), {}),
  request_models: defaulted(recordOf(str), {}),
  request_validator_id: optional(str),
  operation_name: optional(str),
})
  .withInvariants([
    requiredWhen(
      "authorizer_id",
      (attrs) => AUTHORIZER_TYPES.includes(attrs.authorization),
      (attrs) => `authorizer_id is required when authorization is ${attrs.authorization}`,
    ),
    forbiddenUnless(
      "authorization_scopes",
      (attrs) => attrs.authorization === "COGNITO_USER_POOLS",
      "authorization_scopes can only be used with COGNITO_USER_POOLS authorization",
    ),
    invariant(
      "request_parameter_format",
      (attrs) => Object.keys(attrs.request_parameters).every((key) => REQUEST_PARAMETER.test(key)),
      (attrs) => {
        const bad = Object.keys(attrs.request_parameters).find((k) => !REQUEST_PARAMETER.test(k));
        return (
          `Invalid request parameter format: ${bad}. ` +
          "Expected format: method.request.{location}.{name}"
        );
      },
    ),
    invariant(
      "request_model_content_type",
      (attrs) => Object.keys(attrs.request_models).every((key) => CONTENT_TYPE.test(key)),
      (attrs) => {
        const bad = Object.keys(attrs.request_models).find((key) => !CONTENT_TYPE.test(key));
        return `Invalid content type format: ${bad}`;
      },
    ),
  ])
  .withDerived((attrs) => ({
    requiresAuthorization: attrs.authorization !== "NONE",
    isCognitoAuthorized: attrs.authorization === "COGNITO_USER_POOLS",
    isIamAuthorized: attrs.authorization === "AWS_IAM",
    isCustomAuthorized: attrs.authorization === "CUSTOM",
    hasRequestValidation:
      Object.keys(attrs.request_models).length > 0 || attrs.request_validator_id !== undefined,
    corsEnabled: attrs.http_method === "OPTIONS",
  }));

export type ApiGatewayMethod = ValidatedOf<typeof apiGatewayMethodSchema>;

export const apiGatewayMethod = defineResourceType({
  type: "aws_api_gateway_method",
  schema: apiGatewayMethodSchema,
  outputs: ["rest_api_id", "resource_id", "http_method", "authorization", "authorizer_id"],
  render: ({ attributes: method }, b) => {
    b.set("rest_api_id", method.rest_api_id)
      .set("resource_id", method.resource_id)
      .set("http_method", method.http_method)
      .set("authorization", method.authorization)
      .setIfPresent("authorizer_id", method.authorizer_id);
    if (method.authorization_scopes.length > 0) {
      b.set("authorization_scopes", method.authorization_scopes);
    }
    if (method.api_key_required) b.set("api_key_required", true);
    if (Object.keys(method.request_parameters).length > 0) {
      b.block("request_parameters", (p) => p.attributes(method.request_parameters));
    }
    if (Object.keys(method.request_models).length > 0) {
      b.block("request_models", (m) => m.attributes(method.request_models));
    }
    b.setIfPresent("request_validator_id", method.request_validator_id).setIfPresent(
      "operation_name",
      method.operation_name,
    );
  },
});

export const awsApiGatewayMethod = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(apiGatewayMethod, name, attributes);
