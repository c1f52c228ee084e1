export const POLICY_TYPE_VALUES = [
    "harmonic",
    "energy",
    "stylistic",
    "temporal",
    "linguistic",
    "contextual",
    "quality",
    "diversity",
    "narrative",
    "custom",
] as const;

export type PolicyType = (typeof POLICY_TYPE_VALUES)[number];

export const OPERATOR_VALUES = [
    "equals",
    "not_equals",
    "greater_than",
    "less_than",
    "greater_equal",
    "less_equal",
    "contains",
    "not_contains",
    "in_list",
    "not_in_list",
    "similar_to",
    "compatible_with",
    "within_range",
    "matches_pattern",
] as const;

export type OperatorType = (typeof OPERATOR_VALUES)[number];

export const RULE_PRIORITY_VALUES = [
    "critical",
    "high",
    "medium",
    "low",
    "suggestion",
] as const;

export type RulePriority = (typeof RULE_PRIORITY_VALUES)[number];

export const PRIORITY_MULTIPLIERS: Record<RulePriority, number> = {
    critical: 3.0,
    high: 2.0,
    medium: 1.0,
    low: 0.5,
    suggestion: 0.2,
};

export const COMBINATION_MODE_VALUES = [
    "weighted_sum",
    "all_required",
    "any_satisfied",
    "majority",
] as const;

export type CombinationMode = (typeof COMBINATION_MODE_VALUES)[number];

export const RULE_CONTEXT_VALUES = ["track", "transition", "sequence", "global"] as const;

export type RuleContext = (typeof RULE_CONTEXT_VALUES)[number];

export type PolicyScalar = string | number | boolean;
export type PolicyValue = PolicyScalar | PolicyScalar[] | null;

export interface PolicyRule {
    id: string;
    name: string;
    description: string;
    policyType: PolicyType;
    field: string;
    operator: OperatorType;
    value: PolicyValue;
    context: RuleContext;
    priority: RulePriority;
    weight: number;
    enabled: boolean;
    /** Numeric slack, or the similarity threshold for similar_to/compatible_with. */
    tolerance: number;
    adaptive: boolean;
    timeSensitive: boolean;
    createdBy: string;
    tags: string[];
    notes: string;
}

export interface PolicyRuleSet {
    id: string;
    name: string;
    description: string;
    rules: PolicyRule[];
    combinationMode: CombinationMode;
    minimumScore: number;
    version: string;
    createdBy: string;
    tags: string[];
    enabled: boolean;
}

export interface MixingPolicy {
    id: string;
    name: string;
    description: string;
    version: string;
    ruleSets: PolicyRuleSet[];
    globalWeights: Partial<Record<PolicyType, number>>;
    optimizationObjective: string;
    fallbackStrategy: string;
    strictMode: boolean;
    adaptiveWeights: boolean;
    createdBy: string;
    createdAt: string;
    lastModified: string;
    usageCount: number;
    tags: string[];
}

/** Playback situation used by adaptive rules. */
export interface PolicyContext {
    timeOfDay?: string;
    activity?: string;
}

export interface PolicyEvaluationResult {
    ruleId: string;
    ruleName: string;
    satisfied: boolean;
    score: number;
    expectedValue: PolicyValue;
    actualValue: PolicyValue | undefined;
    message: string;
    weight: number;
    priority: RulePriority;
}

export interface PolicyApplicationResult {
    policyId: string;
    totalScore: number;
    ruleResults: PolicyEvaluationResult[];
    ruleSetScores: Record<string, number>;
    satisfiedCriticalRules: boolean;
    recommendations: string[];
    warnings: string[];
}

export type PolicyRuleInput = Pick<
    PolicyRule,
    "id" | "name" | "policyType" | "field" | "operator" | "value"
> &
    Partial<PolicyRule>;

export type PolicyRuleSetInput = Pick<PolicyRuleSet, "id" | "name"> &
    Partial<PolicyRuleSet>;

export type MixingPolicyInput = Pick<MixingPolicy, "id" | "name"> &
    Partial<MixingPolicy>;

export function createPolicyRule(input: PolicyRuleInput): PolicyRule {
    return {
        description: "",
        context: "track",
        priority: "medium",
        weight: 1.0,
        enabled: true,
        tolerance: 0,
        adaptive: false,
        timeSensitive: false,
        createdBy: "system",
        tags: [],
        notes: "",
        ...input,
    };
}

export function createRuleSet(input: PolicyRuleSetInput): PolicyRuleSet {
    return {
        description: "",
        rules: [],
        combinationMode: "weighted_sum",
        minimumScore: 0.6,
        version: "1.0",
        createdBy: "system",
        tags: [],
        enabled: true,
        ...input,
    };
}

export function createMixingPolicy(input: MixingPolicyInput): MixingPolicy {
    return {
        description: "",
        version: "1.0",
        ruleSets: [],
        globalWeights: {},
        optimizationObjective: "balanced",
        fallbackStrategy: "greedy",
        strictMode: false,
        adaptiveWeights: true,
        createdBy: "user",
        createdAt: "",
        lastModified: "",
        usageCount: 0,
        tags: [],
        ...input,
    };
}

export function isOperatorType(value: unknown): value is OperatorType {
    return OPERATOR_VALUES.some((operator) => operator === value);
}

/** Ids that occur more than once, in first-repeat order. */
export function findDuplicateIds(items: ReadonlyArray<{ id: string }>): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    items.forEach(({ id }) => {
        if (seen.has(id)) {
            duplicates.add(id);
        }
        seen.add(id);
    });
    return [...duplicates];
}

/**
 * Repeated rule-set ids within a policy, and repeated rule ids within a
 * rule set as `<ruleSetId>.<ruleId>`.
 */
export function findDuplicatePolicyIds(ruleSets: ReadonlyArray<PolicyRuleSet>): string[] {
    return [
        ...findDuplicateIds(ruleSets),
        ...ruleSets.flatMap((ruleSet) =>
            findDuplicateIds(ruleSet.rules).map((ruleId) => `${ruleSet.id}.${ruleId}`),
        ),
    ];
}

/** Fields `PolicyManager.updatePolicy` may change. */
export type MixingPolicyUpdate = Partial<
    Omit<MixingPolicy, "id" | "createdBy" | "createdAt" | "lastModified">
>;
