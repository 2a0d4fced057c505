import { ResourceRegistry } from "../../facade/registry.js";
import type { AnyResourceType } from "../../facade/resource-type.js";
import { apiGatewayIntegration } from "./api-gateway-integration.js";
import { apiGatewayMethod } from "./api-gateway-method.js";
import { autoscalingGroup } from "./autoscaling-group.js";
import { costCategory } from "./cost-category.js";
import { ecrRepository } from "./ecr-repository.js";
import { iamPolicy } from "./iam-policy.js";
import { lambdaPermission } from "./lambda-permission.js";
import { launchTemplate } from "./launch-template.js";

export const awsResourceTypes: readonly AnyResourceType[] = [
  apiGatewayIntegration,
  apiGatewayMethod,
  autoscalingGroup,
  costCategory,
  ecrRepository,
  iamPolicy,
  lambdaPermission,
  launchTemplate,
];

export function registerAwsResources(
  registry: ResourceRegistry = new ResourceRegistry(),
): ResourceRegistry {
  return registry.register(...awsResourceTypes);
}

export * from "./api-gateway-integration.js";
export * from "./api-gateway-method.js";
export * from "./autoscaling-group.js";
export * from "./cost-category.js";
export * from "./ecr-repository.js";
export * from "./iam-policy.js";
export * from "./lambda-permission.js";
export * from "./launch-template.js";
export {
  ACCOUNT_ID_PATTERN,
  ARN_PATTERN,
  bool,
  enumOf,
  integer,
  renderTags,
  str,
  stringList,
  tags,
} from "./common.js";
