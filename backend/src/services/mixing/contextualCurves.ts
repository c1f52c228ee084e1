/**
 * Contextual mixing curves: named energy shapes for a time of day,
 * activity, energy preference, mood or season, and the context-fit score a
 * track earns against one of them. Curve definitions live in
 * `data/contextualCurves.json`.
 */

import { z } from "zod";
import type { TrackMetadata } from "@mixflow/track-analysis-contract";
import rawCurves from "../../data/contextualCurves.json";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import { Rng, sampleNormal } from "../../utils/seededRandom";
import { extractStyleProfile } from "./stylisticCompatibility";

export const CONTEXT_TYPE_VALUES = ["time", "activity", "energy", "mood", "season"] as const;
export type ContextType = (typeof CONTEXT_TYPE_VALUES)[number];

export const CURVE_SHAPE_VALUES = [
    "flat",
    "ascending",
    "descending",
    "peak",
    "valley",
    "wave",
    "build_drop",
] as const;
export type CurveShape = (typeof CURVE_SHAPE_VALUES)[number];

export interface ContextualCurve {
    id: string;
    name: string;
    contextType: ContextType;
    contextValue: string;
    shape: CurveShape;
    /** Low and high energy bounds. */
    energyRange: [number, number];
    durationMinutes: number;
    peakPosition: number;
    transitionSmoothness: number;
    moodPreference: string[];
    activityPreference: string[];
}

export type CurveCatalog = Record<ContextType, Record<string, ContextualCurve>>;

export interface CurveSelection {
    timeOfDay?: string;
    activity?: string;
    energyPreference?: string;
    moodPreference?: string;
    season?: string;
    durationMinutes?: number;
}

export const CONTEXT_WEIGHTS = {
    time: 0.3,
    activity: 0.25,
    energy: 0.2,
    mood: 0.15,
    crowd: 0.1,
} as const;

const DEFAULT_CURVE_ID = "evening";
const FLAT_NOISE_STD_DEV = 0.05;
const VALLEY_POSITION = 0.4;
const BUILD_POSITION = 0.7;

const COMPATIBLE_TIMES: Record<string, string[]> = {
    morning: ["afternoon"],
    afternoon: ["morning", "evening"],
    evening: ["afternoon", "night"],
    night: ["evening", "late_night"],
    late_night: ["night"],
};

const COMPATIBLE_ACTIVITIES: Record<string, string[]> = {
    party: ["dance", "celebration", "social dancing"],
    workout: ["fitness", "energy", "motivation"],
    chill: ["relax", "background", "lounge"],
    dance: ["party", "social dancing", "celebration"],
    focus: ["work", "study", "background"],
};

const COMPATIBLE_MOODS: Record<string, string[]> = {
    energetic: ["uplifting", "festive", "powerful"],
    romantic: ["passionate", "sensual", "emotional"],
    uplifting: ["happy", "positive", "energetic"],
    chill: ["relaxed", "calm", "smooth"],
    passionate: ["romantic", "intense", "emotional"],
};

const curveDefinitionSchema = z.object({
    name: z.string().min(1),
    contextValue: z.string().min(1),
    shape: z.enum(CURVE_SHAPE_VALUES),
    energyRange: z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)]),
    durationMinutes: z.number().int().positive(),
    peakPosition: z.number().gt(0).lt(1).default(0.7),
    transitionSmoothness: z.number().min(0).max(1).default(0.8),
    moodPreference: z.array(z.string()).default([]),
    activityPreference: z.array(z.string()).default([]),
});

const curveGroupSchema = z.record(curveDefinitionSchema);

const curveCatalogSchema = z.object({
    time: curveGroupSchema,
    activity: curveGroupSchema,
    energy: curveGroupSchema,
    mood: curveGroupSchema,
    season: curveGroupSchema,
});

type CurveGroup = z.infer<typeof curveGroupSchema>;

function buildGroup(
    contextType: ContextType,
    group: CurveGroup,
): Record<string, ContextualCurve> {
    const curves: Record<string, ContextualCurve> = {};
    Object.entries(group).forEach(([id, definition]) => {
        const [a, b] = definition.energyRange;
        curves[id] = {
            id,
            contextType,
            ...definition,
            energyRange: [Math.min(a, b), Math.max(a, b)],
        };
    });
    return curves;
}

export function parseCurveCatalog(raw: unknown): CurveCatalog {
    const parsed = curveCatalogSchema.safeParse(raw);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Contextual curve definitions are malformed",
            { issues: parsed.error.errors },
        );
    }
    return {
        time: buildGroup("time", parsed.data.time),
        activity: buildGroup("activity", parsed.data.activity),
        energy: buildGroup("energy", parsed.data.energy),
        mood: buildGroup("mood", parsed.data.mood),
        season: buildGroup("season", parsed.data.season),
    };
}

/** Matches a curve id first, then a curve's context value ("romantic"). */
function lookupCurve(
    group: Record<string, ContextualCurve>,
    value: string | undefined,
): ContextualCurve | undefined {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) {
        return undefined;
    }
    return (
        group[normalized] ??
        Object.values(group).find((curve) => curve.contextValue === normalized)
    );
}

function listIncludes(list: string[], value: string): boolean {
    return list.some((entry) => entry.toLowerCase() === value);
}

function isCompatibleWithAny(
    table: Record<string, string[]>,
    value: string,
    preferences: string[],
): boolean {
    return preferences.some((preference) =>
        (table[preference.toLowerCase()] ?? []).includes(value),
    );
}

function linspace(count: number): number[] {
    return Array.from({ length: count }, (_, i) => i / (count - 1));
}

function clamp(value: number, low: number, high: number): number {
    return Math.max(low, Math.min(high, value));
}

export class ContextualCurveEngine {
    private readonly catalog: CurveCatalog;

    constructor(catalog: CurveCatalog = parseCurveCatalog(rawCurves)) {
        this.catalog = catalog;
    }

    getCurve(contextType: ContextType, id: string): ContextualCurve | undefined {
        return this.catalog[contextType][id];
    }

    getAvailableCurves(): Record<ContextType, string[]> {
        return {
            time: Object.keys(this.catalog.time),
            activity: Object.keys(this.catalog.activity),
            energy: Object.keys(this.catalog.energy),
            mood: Object.keys(this.catalog.mood),
            season: Object.keys(this.catalog.season),
        };
    }

    /**
     * Activity curves win over the other candidates; otherwise the first match
     * in time, activity, energy, mood, season order. Returns a copy.
     */
    selectContextualCurve(selection: CurveSelection = {}): ContextualCurve {
        const candidates = [
            lookupCurve(this.catalog.time, selection.timeOfDay),
            lookupCurve(this.catalog.activity, selection.activity),
            lookupCurve(this.catalog.energy, selection.energyPreference),
            lookupCurve(this.catalog.mood, selection.moodPreference),
            lookupCurve(this.catalog.season, selection.season),
        ].filter((curve): curve is ContextualCurve => curve !== undefined);

        const chosen =
            candidates.find((curve) => curve.contextType === "activity") ??
            candidates[0] ??
            this.catalog.time[DEFAULT_CURVE_ID];

        return {
            ...chosen,
            energyRange: [...chosen.energyRange],
            moodPreference: [...chosen.moodPreference],
            activityPreference: [...chosen.activityPreference],
            durationMinutes: selection.durationMinutes || chosen.durationMinutes,
        };
    }

    /** One target energy per playlist position. */
    generateEnergyProgression(curve: ContextualCurve, count: number, rng: Rng): number[] {
        const [low, high] = curve.energyRange;
        if (count <= 1) {
            return count === 1 ? [(low + high) / 2] : [];
        }

        const span = high - low;
        const raw = linspace(count).map((position) => {
            switch (curve.shape) {
                case "flat":
                    return sampleNormal(rng, (low + high) / 2, FLAT_NOISE_STD_DEV);
                case "ascending":
                    return low + span * position;
                case "descending":
                    return high - span * position;
                case "peak":
                    return position <= curve.peakPosition
                        ? low + span * (position / curve.peakPosition)
                        : high -
                              span *
                                  ((position - curve.peakPosition) / (1 - curve.peakPosition)) *
                                  0.5;
                case "valley":
                    return position <= VALLEY_POSITION
                        ? high - span * (position / VALLEY_POSITION) * 0.6
                        : low + span * ((position - VALLEY_POSITION) / (1 - VALLEY_POSITION));
                case "wave":
                    return low + span * (Math.sin(position * Math.PI * 2.5) * 0.3 + 0.5);
                case "build_drop":
                    if (position <= BUILD_POSITION) {
                        return low + span * (position / BUILD_POSITION);
                    }
                    return position <= BUILD_POSITION + 0.1 ? high * 0.6 : high * 0.7;
            }
        });

        const clamped = raw.map((energy) => clamp(energy, low, high));
        const smoothing = curve.transitionSmoothness;
        if (smoothing <= 0.5 || clamped.length <= 2) {
            return clamped;
        }

        return clamped.map((energy, i) => {
            if (i === 0 || i === clamped.length - 1) {
                return energy;
            }
            const neighbours = (clamped[i - 1] + clamped[i + 1]) / 2;
            return energy * (1 - smoothing) + neighbours * smoothing;
        });
    }

    /**
     * Renormalized blend of time, activity, danceability against the target
     * energy, mood and crowd appeal. 0.5 when no dimension applies.
     */
    calculateTrackContextScore(
        metadata: TrackMetadata | null | undefined,
        curve: ContextualCurve,
        targetEnergy: number,
    ): number {
        const profile = extractStyleProfile(metadata);
        let score = 0;
        let totalWeight = 0;

        if (profile.timeOfDay && curve.contextType === "time") {
            let match = 0.2;
            if (profile.timeOfDay === curve.contextValue) {
                match = 1.0;
            } else if (
                (COMPATIBLE_TIMES[curve.contextValue] ?? []).includes(profile.timeOfDay)
            ) {
                match = 0.7;
            }
            score += CONTEXT_WEIGHTS.time * match;
            totalWeight += CONTEXT_WEIGHTS.time;
        }

        if (profile.activity && curve.activityPreference.length > 0) {
            let match = 0.1;
            if (listIncludes(curve.activityPreference, profile.activity)) {
                match = 1.0;
            } else if (
                isCompatibleWithAny(
                    COMPATIBLE_ACTIVITIES,
                    profile.activity,
                    curve.activityPreference,
                )
            ) {
                match = 0.6;
            }
            score += CONTEXT_WEIGHTS.activity * match;
            totalWeight += CONTEXT_WEIGHTS.activity;
        }

        if (profile.danceability !== undefined) {
            const energyFit = Math.max(0, 1 - Math.abs(profile.danceability - targetEnergy));
            score += CONTEXT_WEIGHTS.energy * energyFit;
            totalWeight += CONTEXT_WEIGHTS.energy;
        }

        if (profile.mood && curve.moodPreference.length > 0) {
            let match = 0.3;
            if (listIncludes(curve.moodPreference, profile.mood)) {
                match = 1.0;
            } else if (isCompatibleWithAny(COMPATIBLE_MOODS, profile.mood, curve.moodPreference)) {
                match = 0.6;
            }
            score += CONTEXT_WEIGHTS.mood * match;
            totalWeight += CONTEXT_WEIGHTS.mood;
        }

        if (profile.crowdAppeal !== undefined) {
            score += CONTEXT_WEIGHTS.crowd * profile.crowdAppeal;
            totalWeight += CONTEXT_WEIGHTS.crowd;
        }

        return totalWeight > 0 ? score / totalWeight : 0.5;
    }
}

export const contextualCurveEngine = new ContextualCurveEngine();
