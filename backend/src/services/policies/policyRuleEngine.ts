/**
 * Policy Rule Engine
 *
 * Evaluates field/operator/value rules against a track and its enrichment
 * metadata, then aggregates rule scores into rule-set and policy scores.
 */

import { normalizePercentage } from "@mixflow/track-analysis-contract";
import type { Track, TrackMetadata } from "@mixflow/track-analysis-contract";
import {
    ErrorCode,
    PolicyConfigurationError,
    getErrorMessage,
} from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import {
    MixingPolicy,
    OperatorType,
    PRIORITY_MULTIPLIERS,
    PolicyApplicationResult,
    PolicyContext,
    PolicyEvaluationResult,
    PolicyRule,
    PolicyRuleSet,
    PolicyScalar,
    PolicyValue,
    isOperatorType,
} from "./policyTypes";

const log = createLogger("Policies.RuleEngine");

const DEFAULT_SIMILARITY_THRESHOLD = 0.8;
const DEFAULT_COMPATIBILITY_THRESHOLD = 0.7;
const PARTIAL_CREDIT_BAND = 0.2;
const MIN_ADAPTIVE_MULTIPLIER = 0.1;
const MAX_ADAPTIVE_MULTIPLIER = 2.0;

/** Raised for values an operator cannot work with, such as text compared numerically. */
export class MalformedValueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "MalformedValueError";
        Object.setPrototypeOf(this, MalformedValueError.prototype);
    }
}

type FieldAccessor = (track: Track, metadata: TrackMetadata | null) => PolicyValue | undefined;

function toPolicyValue(value: unknown): PolicyValue | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        return value;
    }
    if (Array.isArray(value)) {
        const scalars = value.filter(
            (entry): entry is PolicyScalar =>
                typeof entry === "string" ||
                typeof entry === "number" ||
                typeof entry === "boolean",
        );
        return scalars;
    }
    return undefined;
}

const metadataField =
    (field: string): FieldAccessor =>
    (_track, metadata) =>
        metadata ? toPolicyValue(metadata[field]) : undefined;

const percentageField =
    (field: string): FieldAccessor =>
    (_track, metadata) =>
        metadata ? normalizePercentage(metadata[field]) : undefined;

/** Field name -> typed getter. Unlisted fields read the raw metadata key. */
export const FIELD_ACCESSORS: Readonly<Record<string, FieldAccessor>> = {
    id: (track) => track.id,
    title: (track) => track.title,
    artist: (track) => track.artist,
    key: (track) => track.key ?? undefined,
    bpm: (track) => track.bpm ?? undefined,
    energy: (track) => track.energy ?? undefined,
    emotional_intensity: (track) => track.emotionalIntensity ?? undefined,
    genre: (track) => track.genre ?? undefined,
    duration: (track) => track.duration ?? undefined,
    subgenre: metadataField("subgenre"),
    mood: metadataField("mood"),
    era: metadataField("era"),
    language: metadataField("language"),
    time_of_day: metadataField("time_of_day"),
    activity: metadataField("activity"),
    season: metadataField("season"),
    danceability: percentageField("danceability"),
    crowd_appeal: percentageField("crowd_appeal"),
    mix_friendly: percentageField("mix_friendly"),
};

export function extractFieldValue(
    field: string,
    track: Track,
    metadata: TrackMetadata | null,
): PolicyValue | undefined {
    const accessor = Object.prototype.hasOwnProperty.call(FIELD_ACCESSORS, field)
        ? FIELD_ACCESSORS[field]
        : metadataField(field);
    return accessor(track, metadata);
}

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Numbers and plain numeric text. Percent strings are not numeric. */
export function isNumericValue(value: PolicyValue | undefined): boolean {
    if (typeof value === "number") {
        return Number.isFinite(value);
    }
    return typeof value === "string" && NUMERIC_TEXT.test(value.trim());
}

export function toNumeric(value: PolicyValue | undefined): number {
    if (typeof value === "number" && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === "string") {
        const trimmed = value.trim();
        if (trimmed.endsWith("%") && NUMERIC_TEXT.test(trimmed.slice(0, -1))) {
            return Number.parseFloat(trimmed.slice(0, -1)) / 100;
        }
        if (NUMERIC_TEXT.test(trimmed)) {
            return Number.parseFloat(trimmed);
        }
    }
    throw new MalformedValueError(`Cannot convert ${formatValue(value)} to numeric`);
}

export function formatValue(value: PolicyValue | undefined): string {
    if (value === undefined || value === null) {
        return "None";
    }
    if (Array.isArray(value)) {
        return `[${value.map((entry) => formatValue(entry)).join(", ")}]`;
    }
    return String(value);
}

function asList(value: PolicyValue): PolicyScalar[] {
    if (Array.isArray(value)) {
        return value;
    }
    return value === null ? [] : [value];
}

/** Token-set Jaccard similarity, case-insensitive. */
export function similarityScore(a: PolicyValue | undefined, b: PolicyValue | undefined): number {
    const textA = formatValue(a).toLowerCase();
    const textB = formatValue(b).toLowerCase();
    if (textA === textB) {
        return 1.0;
    }

    const tokensA = new Set(textA.split(/\s+/).filter(Boolean));
    const tokensB = new Set(textB.split(/\s+/).filter(Boolean));
    if (tokensA.size === 0 && tokensB.size === 0) {
        return 1.0;
    }
    if (tokensA.size === 0 || tokensB.size === 0) {
        return 0.0;
    }

    let intersection = 0;
    tokensA.forEach((token) => {
        if (tokensB.has(token)) {
            intersection += 1;
        }
    });
    const union = tokensA.size + tokensB.size - intersection;
    return union > 0 ? intersection / union : 0.0;
}

function withinRange(actual: PolicyValue, range: PolicyValue, tolerance: number): boolean {
    if (!isNumericValue(actual) || !Array.isArray(range) || range.length !== 2) {
        return false;
    }
    const value = toNumeric(actual);
    const [min, max] = range.map((bound) => toNumeric(bound));
    return min - tolerance <= value && value <= max + tolerance;
}

function matchesPattern(actual: PolicyValue, pattern: PolicyValue): boolean {
    let expression: RegExp;
    try {
        expression = new RegExp(`^(?:${formatValue(pattern)})`);
    } catch (error) {
        log.debug(`Invalid rule pattern ${formatValue(pattern)}`, { error });
        return false;
    }
    return expression.test(formatValue(actual));
}

function valuesEqual(actual: PolicyValue, expected: PolicyValue, tolerance: number): boolean {
    if (isNumericValue(actual) && isNumericValue(expected)) {
        return Math.abs(toNumeric(actual) - toNumeric(expected)) <= tolerance;
    }
    return formatValue(actual).toLowerCase() === formatValue(expected).toLowerCase();
}

function inList(actual: PolicyValue, list: PolicyValue): boolean {
    const needle = formatValue(actual).toLowerCase();
    return asList(list).some((entry) => formatValue(entry).toLowerCase() === needle);
}

function assertNever(operator: never): never {
    throw new PolicyConfigurationError(
        ErrorCode.UNKNOWN_OPERATOR,
        `Unknown operator: ${String(operator)}`,
        { operator },
    );
}

/**
 * Applies one operator. Similarity operators treat a zero tolerance as
 * "use the default threshold".
 */
export function applyOperator(
    operator: OperatorType,
    actual: PolicyValue,
    expected: PolicyValue,
    tolerance: number,
): boolean {
    switch (operator) {
        case "equals":
            return valuesEqual(actual, expected, tolerance);
        case "not_equals":
            return !valuesEqual(actual, expected, tolerance);
        case "greater_than":
            return toNumeric(actual) > toNumeric(expected) - tolerance;
        case "less_than":
            return toNumeric(actual) < toNumeric(expected) + tolerance;
        case "greater_equal":
            return toNumeric(actual) >= toNumeric(expected) - tolerance;
        case "less_equal":
            return toNumeric(actual) <= toNumeric(expected) + tolerance;
        case "contains":
            return formatValue(actual).toLowerCase().includes(formatValue(expected).toLowerCase());
        case "not_contains":
            return !formatValue(actual).toLowerCase().includes(formatValue(expected).toLowerCase());
        case "in_list":
            return inList(actual, expected);
        case "not_in_list":
            return !inList(actual, expected);
        case "similar_to":
            return (
                similarityScore(actual, expected) >=
                (tolerance > 0 ? tolerance : DEFAULT_SIMILARITY_THRESHOLD)
            );
        case "compatible_with":
            return (
                similarityScore(actual, expected) >=
                (tolerance > 0 ? tolerance : DEFAULT_COMPATIBILITY_THRESHOLD)
            );
        case "within_range":
            return withinRange(actual, expected, tolerance);
        case "matches_pattern":
            return matchesPattern(actual, expected);
        default:
            return assertNever(operator);
    }
}

/** Near-miss credit for numeric rules; everything else scores 0 when unsatisfied. */
export function calculatePartialScore(rule: PolicyRule, actual: PolicyValue): number {
    if (!isNumericValue(actual) || !isNumericValue(rule.value)) {
        return 0.0;
    }

    const actualNumber = toNumeric(actual);
    const expectedNumber = toNumeric(rule.value);
    const band = expectedNumber * PARTIAL_CREDIT_BAND;

    switch (rule.operator) {
        case "equals":
            if (rule.tolerance > 0) {
                const distance = Math.abs(actualNumber - expectedNumber);
                return Math.max(0, 1 - distance / (rule.tolerance * 2));
            }
            return 0.0;
        case "greater_than":
        case "greater_equal":
            if (actualNumber < expectedNumber && band > 0) {
                return Math.max(0, 1 - (expectedNumber - actualNumber) / band);
            }
            return 0.0;
        case "less_than":
        case "less_equal":
            if (actualNumber > expectedNumber && band > 0) {
                return Math.max(0, 1 - (actualNumber - expectedNumber) / band);
            }
            return 0.0;
        default:
            return 0.0;
    }
}

export function calculateAdaptiveMultiplier(rule: PolicyRule, context: PolicyContext): number {
    let multiplier = 1.0;
    const targetsEnergy = rule.field.toLowerCase().includes("energy");

    if (rule.timeSensitive && context.timeOfDay && rule.policyType === "energy" && targetsEnergy) {
        if (context.timeOfDay === "morning" || context.timeOfDay === "evening") {
            multiplier *= 1.2;
        } else if (context.timeOfDay === "night") {
            multiplier *= 0.8;
        }
    }

    if (context.activity === "workout" && rule.policyType === "energy") {
        multiplier *= 1.3;
    } else if (context.activity === "chill" && rule.policyType === "harmonic") {
        multiplier *= 1.1;
    }

    return Math.max(MIN_ADAPTIVE_MULTIPLIER, Math.min(MAX_ADAPTIVE_MULTIPLIER, multiplier));
}

function buildResult(
    rule: PolicyRule,
    fields: Pick<PolicyEvaluationResult, "satisfied" | "score" | "actualValue" | "message">,
): PolicyEvaluationResult {
    return {
        ruleId: rule.id,
        ruleName: rule.name,
        expectedValue: rule.value,
        weight: rule.weight,
        priority: rule.priority,
        ...fields,
    };
}

function hasContext(context: PolicyContext | null | undefined): context is PolicyContext {
    return Boolean(context && (context.timeOfDay || context.activity));
}

export function ruleSetPolicyType(ruleSet: PolicyRuleSet) {
    return ruleSet.rules.length > 0 ? ruleSet.rules[0].policyType : "custom";
}

export class PolicyRuleEngine {
    /**
     * Evaluates one rule. Missing fields and malformed values degrade to a
     * zero score; an unknown operator throws `PolicyConfigurationError`.
     */
    evaluateRule(
        rule: PolicyRule,
        track: Track,
        metadata?: TrackMetadata | null,
        context?: PolicyContext | null,
    ): PolicyEvaluationResult {
        if (!isOperatorType(rule.operator)) {
            throw new PolicyConfigurationError(
                ErrorCode.UNKNOWN_OPERATOR,
                `Unknown operator: ${String(rule.operator)}`,
                { ruleId: rule.id },
            );
        }

        let actualValue: PolicyValue | undefined;
        try {
            actualValue = extractFieldValue(rule.field, track, metadata ?? null);
            if (actualValue === undefined || actualValue === null) {
                return buildResult(rule, {
                    satisfied: false,
                    score: 0.0,
                    actualValue: undefined,
                    message: `Field '${rule.field}' not available`,
                });
            }

            const satisfied = applyOperator(rule.operator, actualValue, rule.value, rule.tolerance);
            let score = satisfied ? 1.0 : calculatePartialScore(rule, actualValue);

            if (rule.adaptive && hasContext(context)) {
                score = Math.min(1.0, score * calculateAdaptiveMultiplier(rule, context));
            }

            return buildResult(rule, {
                satisfied,
                score,
                actualValue,
                message: satisfied ? "Satisfied" : "Not satisfied",
            });
        } catch (error) {
            if (error instanceof PolicyConfigurationError) {
                throw error;
            }
            return buildResult(rule, {
                satisfied: false,
                score: 0.0,
                actualValue,
                message: `Error evaluating rule: ${getErrorMessage(error)}`,
            });
        }
    }

    /**
     * Weighted mean of enabled rules using `weight * priority multiplier`.
     * A misconfigured rule is logged, scored 0 and reported as a warning so
     * the rest of the set still evaluates.
     */
    evaluateRuleSet(
        ruleSet: PolicyRuleSet,
        track: Track,
        metadata?: TrackMetadata | null,
        context?: PolicyContext | null,
    ) {
        const results: PolicyEvaluationResult[] = [];
        const warnings: string[] = [];
        let satisfiedCriticalRules = true;
        let weightedScore = 0;
        let totalWeight = 0;

        for (const rule of ruleSet.rules) {
            if (!rule.enabled) {
                continue;
            }

            let result: PolicyEvaluationResult;
            try {
                result = this.evaluateRule(rule, track, metadata, context);
            } catch (error) {
                if (!(error instanceof PolicyConfigurationError)) {
                    throw error;
                }
                log.error(`Rule '${rule.id}' in '${ruleSet.id}' is misconfigured`, { error });
                warnings.push(`Rule '${rule.name}' misconfigured: ${error.message}`);
                result = buildResult(rule, {
                    satisfied: false,
                    score: 0.0,
                    actualValue: undefined,
                    message: `Configuration error: ${error.message}`,
                });
            }
            results.push(result);

            if (rule.priority === "critical" && !result.satisfied) {
                satisfiedCriticalRules = false;
                warnings.push(`Critical rule '${rule.name}' not satisfied`);
            }

            const weight = result.weight * PRIORITY_MULTIPLIERS[rule.priority];
            weightedScore += result.score * weight;
            totalWeight += weight;
        }

        return {
            score: totalWeight > 0 ? weightedScore / totalWeight : 0.0,
            weight: totalWeight,
            results,
            warnings,
            satisfiedCriticalRules,
        };
    }

    /**
     * Rule sets are weighted by the global weight of their first rule's
     * policy type times their own total rule weight.
     */
    applyPolicyToTrack(
        policy: MixingPolicy,
        track: Track,
        metadata?: TrackMetadata | null,
        context?: PolicyContext | null,
    ): PolicyApplicationResult {
        const ruleResults: PolicyEvaluationResult[] = [];
        const ruleSetScores: Record<string, number> = {};
        const warnings: string[] = [];
        let satisfiedCriticalRules = true;
        let weightedScore = 0;
        let totalWeight = 0;

        for (const ruleSet of policy.ruleSets) {
            if (!ruleSet.enabled) {
                continue;
            }

            const evaluation = this.evaluateRuleSet(ruleSet, track, metadata, context);
            ruleResults.push(...evaluation.results);
            warnings.push(...evaluation.warnings);
            satisfiedCriticalRules = satisfiedCriticalRules && evaluation.satisfiedCriticalRules;
            ruleSetScores[ruleSet.id] = evaluation.score;

            const typeWeight = policy.globalWeights[ruleSetPolicyType(ruleSet)] ?? 1.0;
            weightedScore += evaluation.score * typeWeight * evaluation.weight;
            totalWeight += typeWeight * evaluation.weight;
        }

        return {
            policyId: policy.id,
            totalScore: totalWeight > 0 ? weightedScore / totalWeight : 0.0,
            ruleResults,
            ruleSetScores,
            satisfiedCriticalRules,
            recommendations: generateRecommendations(ruleResults),
            warnings,
        };
    }
}

export function generateRecommendations(results: PolicyEvaluationResult[]): string[] {
    const recommendations: string[] = [];

    for (const result of results) {
        if (result.satisfied || (result.priority !== "critical" && result.priority !== "high")) {
            continue;
        }
        const ruleId = result.ruleId.toLowerCase();
        if (ruleId.includes("key")) {
            recommendations.push(
                `Consider tracks in compatible keys (currently ${formatValue(result.actualValue)})`,
            );
        } else if (ruleId.includes("bpm")) {
            recommendations.push(
                `Look for tracks with BPM closer to ${formatValue(result.expectedValue)}`,
            );
        } else if (ruleId.includes("energy") || ruleId.includes("danceability")) {
            recommendations.push("Choose tracks with higher energy/danceability");
        }
    }

    return recommendations;
}

export const policyRuleEngine = new PolicyRuleEngine();
