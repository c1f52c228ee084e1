/**
 * Stylistic Compatibility Matrix
 *
 * Categorical compatibility between enrichment metadata values (subgenre,
 * mood, era, language, activity, time of day, season) plus a numeric
 * danceability blend. Lookup tables live in `data/stylisticCompatibility.json`.
 */

import { z } from "zod";
import {
    normalizePercentage,
    normalizeStyleString,
} from "@mixflow/track-analysis-contract";
import type { Track, TrackMetadata } from "@mixflow/track-analysis-contract";
import rawStyleTables from "../../data/stylisticCompatibility.json";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";

export const COMPATIBILITY_LEVELS = {
    perfect: 1.0,
    excellent: 0.9,
    good: 0.7,
    fair: 0.5,
    poor: 0.3,
    incompatible: 0.1,
} as const;

export type CompatibilityLevel = keyof typeof COMPATIBILITY_LEVELS;

export const STYLE_TABLE_DIMENSIONS = [
    "subgenre",
    "mood",
    "era",
    "language",
    "activity",
    "time_of_day",
    "season",
] as const;

export type StyleTableDimension = (typeof STYLE_TABLE_DIMENSIONS)[number];
export type StyleDimension = StyleTableDimension | "danceability";

export const STYLE_WEIGHTS: Record<StyleDimension, number> = {
    subgenre: 0.25,
    mood: 0.2,
    era: 0.15,
    language: 0.1,
    activity: 0.1,
    time_of_day: 0.1,
    season: 0.05,
    danceability: 0.05,
};

const NEUTRAL_SCORE = 0.5;
const BRIDGE_BONUS_THRESHOLD = 0.7;
const BRIDGE_BONUS = 1.2;
const BRIDGE_SUGGESTION_LIMIT = 10;

export interface StyleProfile {
    subgenre?: string;
    mood?: string;
    era?: string;
    language?: string;
    danceability?: number;
    timeOfDay?: string;
    activity?: string;
    season?: string;
    crowdAppeal?: number;
    mixFriendly?: number;
}

export type StyleTable = Record<string, Record<string, CompatibilityLevel>>;
export type StyleTables = Record<StyleTableDimension, StyleTable>;

/** Per-dimension scores; season is not part of the breakdown. */
export type StyleBreakdown = Partial<
    Record<Exclude<StyleDimension, "season">, number>
>;

export interface BridgeCandidate {
    track: Track;
    metadata?: TrackMetadata | null;
}

export interface BridgeSuggestion {
    track: Track;
    bridgeScore: number;
}

const levelSchema = z.enum([
    "perfect",
    "excellent",
    "good",
    "fair",
    "poor",
    "incompatible",
]);
const tableSchema = z.record(z.record(levelSchema));
const styleTablesSchema = z.object({
    subgenre: tableSchema,
    mood: tableSchema,
    era: tableSchema,
    language: tableSchema,
    activity: tableSchema,
    time_of_day: tableSchema,
    season: tableSchema,
});

export function parseStyleTables(raw: unknown): StyleTables {
    const parsed = styleTablesSchema.safeParse(raw);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Stylistic compatibility tables are malformed",
            { issues: parsed.error.errors },
        );
    }
    return parsed.data;
}

const PROFILE_TABLE_FIELDS: Record<StyleTableDimension, keyof StyleProfile> = {
    subgenre: "subgenre",
    mood: "mood",
    era: "era",
    language: "language",
    activity: "activity",
    time_of_day: "timeOfDay",
    season: "season",
};

function profileString(
    profile: StyleProfile,
    dimension: StyleTableDimension,
): string | undefined {
    const value = profile[PROFILE_TABLE_FIELDS[dimension]];
    return typeof value === "string" ? value : undefined;
}

export function extractStyleProfile(metadata?: TrackMetadata | null): StyleProfile {
    if (!metadata) {
        return {};
    }

    return {
        subgenre: normalizeStyleString(metadata.subgenre),
        mood: normalizeStyleString(metadata.mood),
        era: normalizeStyleString(metadata.era),
        language: normalizeStyleString(metadata.language),
        timeOfDay: normalizeStyleString(metadata.time_of_day),
        activity: normalizeStyleString(metadata.activity),
        season: normalizeStyleString(metadata.season),
        danceability: normalizePercentage(metadata.danceability),
        crowdAppeal: normalizePercentage(metadata.crowd_appeal),
        mixFriendly: normalizePercentage(metadata.mix_friendly),
    };
}

/** Harmonic mean of both legs, boosted when both legs are strong. */
export function calculateBridgeScore(toBridge: number, fromBridge: number): number {
    if (toBridge <= 0 || fromBridge <= 0) {
        return 0;
    }
    let score = (2 * toBridge * fromBridge) / (toBridge + fromBridge);
    if (toBridge > BRIDGE_BONUS_THRESHOLD && fromBridge > BRIDGE_BONUS_THRESHOLD) {
        score *= BRIDGE_BONUS;
    }
    return Math.min(score, 1.0);
}

export class StylisticCompatibilityMatrix {
    private readonly tables: StyleTables;

    constructor(tables: StyleTables = parseStyleTables(rawStyleTables)) {
        this.tables = tables;
    }

    extractStyleProfile(metadata?: TrackMetadata | null): StyleProfile {
        return extractStyleProfile(metadata);
    }

    /** Tries `a -> b`, then `b -> a`, then defaults to fair. */
    lookup(dimension: StyleTableDimension, value1: string, value2: string): number {
        const table = this.tables[dimension];
        const forward = table[value1]?.[value2];
        if (forward) {
            return COMPATIBILITY_LEVELS[forward];
        }
        const reverse = table[value2]?.[value1];
        if (reverse) {
            return COMPATIBILITY_LEVELS[reverse];
        }
        return COMPATIBILITY_LEVELS.fair;
    }

    /** Weighted mean over dimensions present on both profiles; 0.5 when none are. */
    calculateStylisticCompatibility(profile1: StyleProfile, profile2: StyleProfile): number {
        let totalScore = 0;
        let totalWeight = 0;

        for (const dimension of STYLE_TABLE_DIMENSIONS) {
            const value1 = profileString(profile1, dimension);
            const value2 = profileString(profile2, dimension);
            if (!value1 || !value2) {
                continue;
            }
            totalScore += this.lookup(dimension, value1, value2) * STYLE_WEIGHTS[dimension];
            totalWeight += STYLE_WEIGHTS[dimension];
        }

        if (profile1.danceability !== undefined && profile2.danceability !== undefined) {
            totalScore +=
                danceabilityScore(profile1.danceability, profile2.danceability) *
                STYLE_WEIGHTS.danceability;
            totalWeight += STYLE_WEIGHTS.danceability;
        }

        return totalWeight > 0 ? totalScore / totalWeight : NEUTRAL_SCORE;
    }

    getStyleDistance(profile1: StyleProfile, profile2: StyleProfile): StyleBreakdown {
        const breakdown: StyleBreakdown = {};

        for (const dimension of STYLE_TABLE_DIMENSIONS) {
            if (dimension === "season") {
                continue;
            }
            const value1 = profileString(profile1, dimension);
            const value2 = profileString(profile2, dimension);
            if (value1 && value2) {
                breakdown[dimension] = this.lookup(dimension, value1, value2);
            }
        }

        if (profile1.danceability !== undefined && profile2.danceability !== undefined) {
            breakdown.danceability = danceabilityScore(
                profile1.danceability,
                profile2.danceability,
            );
        }

        return breakdown;
    }

    suggestBridgeTracks(
        profile1: StyleProfile,
        profile2: StyleProfile,
        candidates: BridgeCandidate[],
    ): BridgeSuggestion[] {
        const suggestions: BridgeSuggestion[] = [];

        for (const candidate of candidates) {
            const bridgeProfile = extractStyleProfile(candidate.metadata);
            const bridgeScore = calculateBridgeScore(
                this.calculateStylisticCompatibility(profile1, bridgeProfile),
                this.calculateStylisticCompatibility(bridgeProfile, profile2),
            );
            if (bridgeScore > 0) {
                suggestions.push({ track: candidate.track, bridgeScore });
            }
        }

        // Equal scores keep pool order
        return suggestions
            .sort((a, b) => b.bridgeScore - a.bridgeScore)
            .slice(0, BRIDGE_SUGGESTION_LIMIT);
    }
}

function danceabilityScore(danceability1: number, danceability2: number): number {
    return Math.max(0, 1.0 - Math.abs(danceability1 - danceability2));
}

export const stylisticCompatibilityMatrix = new StylisticCompatibilityMatrix();
