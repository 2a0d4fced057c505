import { z } from "zod";
import type { BlockBuilder } from "../../core/builder.js";
import { type AttributeInput, defineResourceType } from "../../facade/resource-type.js";
import type { Session } from "../../facade/session.js";
import { defineSchema, type ValidatedOf } from "../../schema/define.js";
import { arrayOf, defaulted, optional, required, value } from "../../schema/field.js";
import {
  forbiddenUnless,
  invariant,
  references,
  requiredWhen,
  uniqueBy,
} from "../../schema/invariants.js";
import { nested } from "../../schema/validate.js";
import { enumOf, renderTags, str, tags } from "./common.js";

export const DIMENSION_KEYS = [
  "AZ",
  "INSTANCE_TYPE",
  "LINKED_ACCOUNT",
  "LINKED_ACCOUNT_NAME",
  "OPERATION",
  "PURCHASE_TYPE",
  "REGION",
  "SERVICE",
  "SERVICE_CODE",
  "USAGE_TYPE",
  "USAGE_TYPE_GROUP",
  "RECORD_TYPE",
  "OPERATING_SYSTEM",
  "TENANCY",
  "SCOPE",
  "PLATFORM",
  "SUBSCRIPTION_ID",
  "LEGAL_ENTITY_NAME",
  "DEPLOYMENT_OPTION",
  "DATABASE_ENGINE",
  "CACHE_ENGINE",
  "INSTANCE_TYPE_FAMILY",
  "BILLING_ENTITY",
  "RESERVATION_ID",
  "RESOURCE_ID",
  "RIGHTSIZING_TYPE",
  "SAVINGS_PLANS_TYPE",
  "SAVINGS_PLAN_ARN",
  "PAYMENT_OPTION",
] as const;

export const MATCH_OPTIONS = [
  "EQUALS",
  "ABSENT",
  "STARTS_WITH",
  "ENDS_WITH",
  "CONTAINS",
  "CASE_SENSITIVE",
  "CASE_INSENSITIVE",
] as const;

export const RESERVED_NAMES = [
  "BLENDED_COST",
  "UNBLENDED_COST",
  "AMORTIZED_COST",
  "NET_UNBLENDED_COST",
  "NET_AMORTIZED_COST",
];

const CATEGORY_CHARSET = /^[a-zA-Z0-9\s\-_.]+$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

type MatchOption = (typeof MATCH_OPTIONS)[number];

export type DimensionFilter = {
  readonly key: (typeof DIMENSION_KEYS)[number];
  readonly values: readonly string[];
  readonly match_options?: readonly MatchOption[];
};

export type TagFilter = {
  readonly key: string;
  readonly values?: readonly string[];
  readonly match_options?: readonly MatchOption[];
};

export type CostCategoryFilter = {
  readonly key: string;
  readonly values: readonly string[];
  readonly match_options?: readonly MatchOption[];
};

export type CostCategoryExpression = {
  readonly and?: readonly CostCategoryExpression[];
  readonly or?: readonly CostCategoryExpression[];
  readonly not?: CostCategoryExpression;
  readonly dimension?: DimensionFilter;
  readonly tags?: TagFilter;
  readonly cost_category?: CostCategoryFilter;
};

const matchOptions = z.array(z.enum(MATCH_OPTIONS)).max(1, "only one match option is allowed");

const expression: z.ZodType<CostCategoryExpression> = z.lazy(() =>
  z
    .object({
      and: z.array(expression).optional(),
      or: z.array(expression).optional(),
      not: expression.optional(),
      dimension: z
        .object({
          key: z.enum(DIMENSION_KEYS),
          values: z.array(z.string()).min(1).max(10000),
          match_options: matchOptions.optional(),
        })
        .optional(),
      tags: z
        .object({
          key: z.string().min(1).max(128),
          values: z.array(z.string()).max(1000).optional(),
          match_options: matchOptions.optional(),
        })
        .optional(),
      cost_category: z
        .object({
          key: z.string().min(1).max(50),
          values: z.array(z.string()).min(1).max(20),
          match_options: matchOptions.optional(),
        })
        .optional(),
    })
    .superRefine((expr, ctx) => {
      const specified = Object.values(expr).filter((condition) => condition !== undefined);
      if (specified.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Cost category expression must specify at least one condition",
        });
      }
      if (expr.and !== undefined && expr.and.length < 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "AND expression must have at least 2 conditions",
        });
      }
      if (expr.or !== undefined && expr.or.length < 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "OR expression must have at least 2 conditions",
        });
      }
    }),
);

const categoryValue = z
  .string({ invalid_type_error: "must be a string" })
  .min(1, "Cost category value must be between 1 and 50 characters")
  .max(50, "Cost category value must be between 1 and 50 characters")
  .regex(
    CATEGORY_CHARSET,
    "Cost category value must contain only alphanumeric characters, " +
      "spaces, hyphens, underscores, and periods",
  )
  .transform((v) => v.trim());

const categoryName = z
  .string({ invalid_type_error: "must be a string" })
  .transform((v) => v.trim())
  .pipe(
    z
      .string()
      .min(1, "Cost category name cannot be empty")
      .refine(
        (v) => !RESERVED_NAMES.includes(v.toUpperCase()),
        `Cost category name cannot be a reserved AWS name: ${RESERVED_NAMES.join(", ")}`,
      )
      .refine(
        (v) => v.length <= 50 && CATEGORY_CHARSET.test(v),
        "Cost category name must be 1-50 letters, numbers, " +
          "spaces, hyphens, underscores, or periods",
      ),
  );

/** Rejects dates such as 2026-02-30 that `Date.parse` rolls over into the next month. */
const isCalendarDate = (v: string): boolean => {
  const time = Date.parse(v);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === v;
};

const isoDate = z
  .string()
  .regex(ISO_DATE, "Effective dates must be in YYYY-MM-DD format")
  .refine(isCalendarDate, "Effective dates must be in YYYY-MM-DD format");

const inheritedValue = defineSchema("aws_ce_cost_category.inherited_value", {
  dimension_key: optional(enumOf(DIMENSION_KEYS)),
  dimension_name: optional(str),
});

const rule = defineSchema("aws_ce_cost_category.rule", {
  value: required(value(categoryValue)),
  rule: required(value(expression)),
  type: defaulted(enumOf(["REGULAR", "INHERITED"]), "REGULAR"),
  inherited_value: optional(nested(inheritedValue)),
}).withInvariants([
  requiredWhen(
    "inherited_value",
    (attrs) => attrs.type === "INHERITED",
    "INHERITED rule type requires inherited_value configuration",
  ),
  forbiddenUnless(
    "inherited_value",
    (attrs) => attrs.type !== "REGULAR",
    "REGULAR rule type cannot have inherited_value configuration",
  ),
]);

const splitChargeParameter = defineSchema("aws_ce_cost_category.split_charge_parameter", {
  type: required(enumOf(["ALLOCATION_PERCENTAGES"])),
  values: required(arrayOf(str, { min: 1 })),
});

const splitTarget = value(z.string().min(1).max(50));

const percentagesOf = (parameters: readonly { readonly values: readonly string[] }[] | undefined) =>
  (parameters?.[0]?.values ?? []).map(Number);

const splitChargeRule = defineSchema("aws_ce_cost_category.split_charge_rule", {
  source: required(splitTarget),
  targets: required(arrayOf(splitTarget, { min: 1, max: 500 })),
  method: required(enumOf(["FIXED", "PROPORTIONAL", "EVEN"])),
  parameters: optional(arrayOf(nested(splitChargeParameter), { max: 10 })),
}).withInvariants([
  requiredWhen(
    "parameters",
    (attrs) => attrs.method !== "EVEN",
    (attrs) => `${attrs.method} split charge method requires parameters`,
  ),
  invariant(
    "fixed_percentages_total",
    (attrs) => {
      if (attrs.method !== "FIXED") return true;
      const total = percentagesOf(attrs.parameters).reduce((sum, p) => sum + p, 0);
      return Math.abs(total - 100) < 0.01;
    },
    "FIXED split charge percentages must sum to 100%",
  ),
  invariant(
    "fixed_percentage_per_target",
    (attrs) =>
      attrs.method !== "FIXED" || percentagesOf(attrs.parameters).length === attrs.targets.length,
    "FIXED split charge must have one percentage per target",
  ),
  forbiddenUnless(
    "parameters",
    (attrs) => attrs.method !== "EVEN",
    "EVEN split charge method should not have parameters",
  ),
  invariant(
    "source_not_target",
    (attrs) => !attrs.targets.includes(attrs.source),
    "Split charge source cannot be in targets list",
  ),
  uniqueBy("targets", (target) => target, "Split charge targets must be unique"),
]);

type CategoryValues = {
  readonly rules: readonly { readonly value: string }[];
  readonly default_value?: string;
};

const categoryValues = (attrs: CategoryValues): readonly string[] => [
  ...attrs.rules.map((r) => r.value),
  ...(attrs.default_value !== undefined ? [attrs.default_value] : []),
];

export function expressionComplexity(expr: CostCategoryExpression): number {
  let complexity = 0;
  if (expr.and !== undefined) complexity += 5;
  if (expr.or !== undefined) complexity += 5;
  if (expr.not !== undefined) complexity += 3;

  for (const sub of expr.and ?? []) complexity += expressionComplexity(sub);
  for (const sub of expr.or ?? []) complexity += expressionComplexity(sub);
  if (expr.not !== undefined) complexity += expressionComplexity(expr.not);

  return complexity;
}

export type ComplexityLevel = "SIMPLE" | "MODERATE" | "COMPLEX" | "VERY_COMPLEX";

export type GovernanceMaturity = "ADVANCED" | "INTERMEDIATE" | "BASIC" | "MINIMAL";

export const complexityLevel = (score: number): ComplexityLevel => {
  if (score <= 20) return "SIMPLE";
  if (score <= 40) return "MODERATE";
  if (score <= 70) return "COMPLEX";
  return "VERY_COMPLEX";
};

export const costCategorySchema = defineSchema("aws_ce_cost_category", {
  name: required(value(categoryName)),
  rules: required(arrayOf(nested(rule), { min: 1, max: 500 })),
  rule_version_arn: optional(
    value(
      z
        .string()
        .regex(
          /^arn:aws:ce::\d{12}:cost-category\/[a-zA-Z0-9-]+$/,
          "rule_version_arn must be a cost category ARN",
        ),
    ),
  ),
  default_value: optional(value(z.string().min(1).max(50))),
  split_charge_rules: optional(arrayOf(nested(splitChargeRule), { max: 10 })),
  effective_start: optional(value(isoDate)),
  effective_end: optional(value(isoDate)),
  tags: defaulted(tags, {}),
})
  .withInvariants([
    invariant(
      "unique_rule_values",
      (attrs) => new Set(attrs.rules.map((r) => r.value)).size === attrs.rules.length,
      "Cost category rule values must be unique within the category",
    ),
    invariant(
      "regular_rule_present",
      (attrs) => attrs.rules.some((r) => r.type !== "INHERITED"),
      "Cost category must have at least one REGULAR rule",
    ),
    invariant(
      "effective_end_after_start",
      (attrs) =>
        attrs.effective_start === undefined ||
        attrs.effective_end === undefined ||
        Date.parse(attrs.effective_end) > Date.parse(attrs.effective_start),
      "Effective end date must be after start date",
    ),
    invariant(
      "effective_start_recent",
      (attrs, context) =>
        attrs.effective_start === undefined ||
        attrs.effective_end === undefined ||
        Date.parse(attrs.effective_start) >= context.now().getTime() - 365 * DAY_MS,
      "Effective start date cannot be more than 1 year in the past",
    ),
    references(
      "split_charge_sources",
      (attrs) => categoryValues(attrs),
      (attrs) => (attrs.split_charge_rules ?? []).map((r) => r.source),
      (missing) => `Split charge source '${missing}' must be a valid cost category value`,
    ),
    references(
      "split_charge_targets",
      (attrs) => categoryValues(attrs),
      (attrs) => (attrs.split_charge_rules ?? []).flatMap((r) => r.targets),
      (missing) => `Split charge target '${missing}' must be a valid cost category value`,
    ),
  ])
  .withDerived((attrs) => {
    const ruleCount = attrs.rules.length;
    const inheritedRuleCount = attrs.rules.filter((r) => r.type === "INHERITED").length;
    const splitChargeRuleCount = attrs.split_charge_rules?.length ?? 0;
    const hasDefaultValue = attrs.default_value !== undefined;
    const hasSplitChargeRules = splitChargeRuleCount > 0;

    const complexityScore = Math.min(
      100,
      attrs.rules.reduce(
        (score, r) => score + expressionComplexity(r.rule),
        ruleCount * 5 + inheritedRuleCount * 3 + splitChargeRuleCount * 10,
      ),
    );

    const allocationCoverageEstimate = Math.min(
      100,
      (ruleCount > 0 ? 60 : 0) +
        (hasDefaultValue ? 20 : 0) +
        Math.min(ruleCount * 2, 15) +
        (hasSplitChargeRules ? 5 : 0),
    );

    let governanceMaturityLevel: GovernanceMaturity = "MINIMAL";
    if (allocationCoverageEstimate >= 90 && hasDefaultValue && hasSplitChargeRules) {
      governanceMaturityLevel = "ADVANCED";
    } else if (allocationCoverageEstimate >= 70 && hasDefaultValue) {
      governanceMaturityLevel = "INTERMEDIATE";
    } else if (allocationCoverageEstimate >= 50) {
      governanceMaturityLevel = "BASIC";
    }

    return {
      ruleCount,
      regularRuleCount: ruleCount - inheritedRuleCount,
      inheritedRuleCount,
      splitChargeRuleCount,
      hasDefaultValue,
      hasSplitChargeRules,
      hasEffectiveDates: attrs.effective_start !== undefined || attrs.effective_end !== undefined,
      isTimeLimited: attrs.effective_end !== undefined,
      complexityScore,
      complexityLevel: complexityLevel(complexityScore),
      allocationCoverageEstimate,
      governanceMaturityLevel,
    };
  });

export type CostCategory = ValidatedOf<typeof costCategorySchema>;

function renderFilter(
  b: BlockBuilder,
  name: string,
  filter: DimensionFilter | TagFilter | CostCategoryFilter,
): void {
  b.block(name, (f) => {
    f.set("key", filter.key).setIfPresent("values", filter.values);
    if (filter.match_options !== undefined && filter.match_options.length > 0) {
      f.set("match_options", filter.match_options);
    }
  });
}

export function renderExpression(b: BlockBuilder, expr: CostCategoryExpression): void {
  for (const sub of expr.and ?? []) b.block("and", (x) => renderExpression(x, sub));
  for (const sub of expr.or ?? []) b.block("or", (x) => renderExpression(x, sub));
  const negated = expr.not;
  if (negated !== undefined) b.block("not", (x) => renderExpression(x, negated));
  if (expr.dimension !== undefined) renderFilter(b, "dimension", expr.dimension);
  if (expr.tags !== undefined) renderFilter(b, "tags", expr.tags);
  if (expr.cost_category !== undefined) renderFilter(b, "cost_category", expr.cost_category);
}

export const costCategory = defineResourceType({
  type: "aws_ce_cost_category",
  schema: costCategorySchema,
  outputs: ["name", "rule_version_arn", "default_value", "effective_start", "effective_end"],
  render: ({ attributes: category }, b) => {
    b.set("name", category.name)
      .setIfPresent("rule_version_arn", category.rule_version_arn)
      .setIfPresent("default_value", category.default_value)
      .setIfPresent("effective_start", category.effective_start)
      .setIfPresent("effective_end", category.effective_end);

    for (const r of category.rules) {
      b.block("rule", (rb) => {
        rb.set("value", r.value)
          .set("type", r.type)
          .block("rule", (e) => renderExpression(e, r.rule));
        const inherited = r.inherited_value;
        if (inherited !== undefined) {
          rb.block("inherited_value", (iv) =>
            iv
              .setIfPresent("dimension_key", inherited.dimension_key)
              .setIfPresent("dimension_name", inherited.dimension_name),
          );
        }
      });
    }

    for (const split of category.split_charge_rules ?? []) {
      b.block("split_charge_rule", (s) => {
        s.set("source", split.source).set("method", split.method).set("targets", split.targets);
        for (const parameter of split.parameters ?? []) {
          s.block("parameter", (p) =>
            p.set("type", parameter.type).set("values", parameter.values),
          );
        }
      });
    }

    renderTags(b, category.tags);
  },
});

export const awsCeCostCategory = (session: Session, name: string, attributes: AttributeInput) =>
  session.declare(costCategory, name, attributes);
