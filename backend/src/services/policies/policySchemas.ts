/**
 * JSON document format for policies: snake_case keys with enum fields
 * stored as their string values. Shared by persistence, import/export and
 * the HTTP surface.
 */

import { z } from "zod";
import {
    COMBINATION_MODE_VALUES,
    MixingPolicy,
    MixingPolicyUpdate,
    OPERATOR_VALUES,
    POLICY_TYPE_VALUES,
    PolicyRule,
    PolicyRuleSet,
    PolicyType,
    RULE_CONTEXT_VALUES,
    RULE_PRIORITY_VALUES,
    findDuplicateIds,
} from "./policyTypes";

const uniqueIds =
    (label: string) =>
    (items: ReadonlyArray<{ id: string }>, ctx: z.RefinementCtx): void => {
        findDuplicateIds(items).forEach((id) => {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Duplicate ${label} id '${id}'`,
            });
        });
    };

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);
const valueSchema = z.union([scalarSchema, z.array(scalarSchema), z.null()]);

export const policyRuleDocumentSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(""),
    policy_type: z.enum(POLICY_TYPE_VALUES),
    field: z.string().min(1),
    operator: z.enum(OPERATOR_VALUES),
    value: valueSchema,
    context: z.enum(RULE_CONTEXT_VALUES).default("track"),
    priority: z.enum(RULE_PRIORITY_VALUES).default("medium"),
    weight: z.number().nonnegative().default(1.0),
    enabled: z.boolean().default(true),
    tolerance: z.number().nonnegative().default(0),
    adaptive: z.boolean().default(false),
    time_sensitive: z.boolean().default(false),
    created_by: z.string().default("user"),
    tags: z.array(z.string()).default([]),
    notes: z.string().default(""),
});

export const policyRuleSetDocumentSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(""),
    rules: z.array(policyRuleDocumentSchema).superRefine(uniqueIds("rule")).default([]),
    combination_mode: z.enum(COMBINATION_MODE_VALUES).default("weighted_sum"),
    minimum_score: z.number().min(0).max(1).default(0.6),
    version: z.string().default("1.0"),
    created_by: z.string().default("user"),
    tags: z.array(z.string()).default([]),
    enabled: z.boolean().default(true),
});

const globalWeightsSchema = z
    .record(z.number().nonnegative())
    .superRefine((weights, ctx) => {
        Object.keys(weights).forEach((key) => {
            if (!isPolicyType(key)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Unknown policy type '${key}'`,
                    path: [key],
                });
            }
        });
    });

export const mixingPolicyDocumentSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(""),
    version: z.string().default("1.0"),
    rule_sets: z
        .array(policyRuleSetDocumentSchema)
        .superRefine(uniqueIds("rule set"))
        .default([]),
    global_weights: globalWeightsSchema.default({}),
    optimization_objective: z.string().default("balanced"),
    fallback_strategy: z.string().default("greedy"),
    strict_mode: z.boolean().default(false),
    adaptive_weights: z.boolean().default(true),
    created_by: z.string().default("user"),
    created_at: z.string().default(""),
    last_modified: z.string().default(""),
    usage_count: z.number().int().nonnegative().default(0),
    tags: z.array(z.string()).default([]),
});

/** Fields a caller may change through `updatePolicy`. */
export const mixingPolicyUpdateSchema = mixingPolicyDocumentSchema
    .omit({ id: true, created_by: true, created_at: true, last_modified: true })
    .partial()
    .strict();

export const policyStoreDocumentSchema = z.object({
    policies: z.array(mixingPolicyDocumentSchema).default([]),
    rule_sets: z.array(policyRuleSetDocumentSchema).default([]),
});

/** Parsed documents: every defaulted field is present. */
export type PolicyRuleDocument = z.infer<typeof policyRuleDocumentSchema>;
export type PolicyRuleSetDocument = z.infer<typeof policyRuleSetDocumentSchema>;
export type MixingPolicyDocument = z.infer<typeof mixingPolicyDocumentSchema>;
export type MixingPolicyUpdateDocument = z.infer<typeof mixingPolicyUpdateSchema>;
export type PolicyStoreDocument = z.infer<typeof policyStoreDocumentSchema>;
export type MixingPolicyDocumentInput = z.input<typeof mixingPolicyDocumentSchema>;

function isPolicyType(value: string): value is PolicyType {
    return POLICY_TYPE_VALUES.some((type) => type === value);
}

export function ruleFromDocument(doc: PolicyRuleDocument): PolicyRule {
    return {
        id: doc.id,
        name: doc.name,
        description: doc.description,
        policyType: doc.policy_type,
        field: doc.field,
        operator: doc.operator,
        value: doc.value,
        context: doc.context,
        priority: doc.priority,
        weight: doc.weight,
        enabled: doc.enabled,
        tolerance: doc.tolerance,
        adaptive: doc.adaptive,
        timeSensitive: doc.time_sensitive,
        createdBy: doc.created_by,
        tags: [...doc.tags],
        notes: doc.notes,
    };
}

export function ruleToDocument(rule: PolicyRule): PolicyRuleDocument {
    return {
        id: rule.id,
        name: rule.name,
        description: rule.description,
        policy_type: rule.policyType,
        field: rule.field,
        operator: rule.operator,
        value: rule.value,
        context: rule.context,
        priority: rule.priority,
        weight: rule.weight,
        enabled: rule.enabled,
        tolerance: rule.tolerance,
        adaptive: rule.adaptive,
        time_sensitive: rule.timeSensitive,
        created_by: rule.createdBy,
        tags: [...rule.tags],
        notes: rule.notes,
    };
}

export function ruleSetFromDocument(doc: PolicyRuleSetDocument): PolicyRuleSet {
    return {
        id: doc.id,
        name: doc.name,
        description: doc.description,
        rules: doc.rules.map(ruleFromDocument),
        combinationMode: doc.combination_mode,
        minimumScore: doc.minimum_score,
        version: doc.version,
        createdBy: doc.created_by,
        tags: [...doc.tags],
        enabled: doc.enabled,
    };
}

export function ruleSetToDocument(ruleSet: PolicyRuleSet): PolicyRuleSetDocument {
    return {
        id: ruleSet.id,
        name: ruleSet.name,
        description: ruleSet.description,
        rules: ruleSet.rules.map(ruleToDocument),
        combination_mode: ruleSet.combinationMode,
        minimum_score: ruleSet.minimumScore,
        version: ruleSet.version,
        created_by: ruleSet.createdBy,
        tags: [...ruleSet.tags],
        enabled: ruleSet.enabled,
    };
}

export function globalWeightsFromDocument(
    weights: Record<string, number> | undefined,
): MixingPolicy["globalWeights"] {
    const output: MixingPolicy["globalWeights"] = {};
    Object.entries(weights ?? {}).forEach(([key, weight]) => {
        if (isPolicyType(key)) {
            output[key] = weight;
        }
    });
    return output;
}

export function globalWeightsToDocument(
    weights: MixingPolicy["globalWeights"],
): Record<string, number> {
    const output: Record<string, number> = {};
    POLICY_TYPE_VALUES.forEach((type) => {
        const weight = weights[type];
        if (weight !== undefined) {
            output[type] = weight;
        }
    });
    return output;
}

export function policyFromDocument(doc: MixingPolicyDocument): MixingPolicy {
    return {
        id: doc.id,
        name: doc.name,
        description: doc.description,
        version: doc.version,
        ruleSets: doc.rule_sets.map(ruleSetFromDocument),
        globalWeights: globalWeightsFromDocument(doc.global_weights),
        optimizationObjective: doc.optimization_objective,
        fallbackStrategy: doc.fallback_strategy,
        strictMode: doc.strict_mode,
        adaptiveWeights: doc.adaptive_weights,
        createdBy: doc.created_by,
        createdAt: doc.created_at,
        lastModified: doc.last_modified,
        usageCount: doc.usage_count,
        tags: [...doc.tags],
    };
}

export function policyToDocument(policy: MixingPolicy): MixingPolicyDocument {
    return {
        id: policy.id,
        name: policy.name,
        description: policy.description,
        version: policy.version,
        rule_sets: policy.ruleSets.map(ruleSetToDocument),
        global_weights: globalWeightsToDocument(policy.globalWeights),
        optimization_objective: policy.optimizationObjective,
        fallback_strategy: policy.fallbackStrategy,
        strict_mode: policy.strictMode,
        adaptive_weights: policy.adaptiveWeights,
        created_by: policy.createdBy,
        created_at: policy.createdAt,
        last_modified: policy.lastModified,
        usage_count: policy.usageCount,
        tags: [...policy.tags],
    };
}

export function policyUpdateFromDocument(doc: MixingPolicyUpdateDocument): MixingPolicyUpdate {
    return {
        name: doc.name,
        description: doc.description,
        version: doc.version,
        ruleSets: doc.rule_sets?.map(ruleSetFromDocument),
        globalWeights: doc.global_weights
            ? globalWeightsFromDocument(doc.global_weights)
            : undefined,
        optimizationObjective: doc.optimization_objective,
        fallbackStrategy: doc.fallback_strategy,
        strictMode: doc.strict_mode,
        adaptiveWeights: doc.adaptive_weights,
        usageCount: doc.usage_count,
        tags: doc.tags,
    };
}
