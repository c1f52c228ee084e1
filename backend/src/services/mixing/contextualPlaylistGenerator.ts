/**
 * Contextual Playlist Generator
 *
 * Greedy, single-pass sequencer. Each step scores every remaining candidate
 * against the current track on harmonic, stylistic, context-fit, energy
 * progression and variety terms, and falls back to the best context fit when
 * nothing reaches the minimum compatibility.
 */

import { normalizePercentage, normalizeStyleString } from "@mixflow/track-analysis-contract";
import type { Track, TrackMetadata, TrackMetadataMap } from "@mixflow/track-analysis-contract";
import { createLogger, withLogTiming } from "../../utils/logger";
import { Rng, createRngFromKey, shuffleWithRng } from "../../utils/seededRandom";
import {
    ContextType,
    ContextualCurve,
    ContextualCurveEngine,
    CurveShape,
    contextualCurveEngine,
} from "./contextualCurves";
import { HarmonicMixingEngine } from "./harmonicEngine";
import {
    StylisticCompatibilityMatrix,
    stylisticCompatibilityMatrix,
} from "./stylisticCompatibility";

const log = createLogger("Mixing.ContextualPlaylist");

export const GENERATION_WEIGHTS = {
    harmonic: 0.25,
    stylistic: 0.25,
    contextualFit: 0.25,
    energyProgression: 0.15,
    variety: 0.1,
} as const;

export const DEFAULT_TARGET_LENGTH = 10;
export const DEFAULT_MIN_COMPATIBILITY = 0.3;
export const DEFAULT_VARIATION_COUNT = 3;

const PERFECT_MATCH_THRESHOLD = 0.8;
const CONTEXT_MISMATCH_THRESHOLD = 0.4;
const INTRO_BONUS = 0.1;
const INTRO_FRIENDLY_THRESHOLD = 0.7;
const INTRO_CURVES = ["morning", "evening"];
const MIN_RELAXED_COMPATIBILITY = 0.2;
const RELAXATION_STEP = 0.1;

export interface PlaylistGenerationRequest {
    tracks: Track[];
    metadata?: TrackMetadataMap;
    targetLength?: number;
    timeOfDay?: string;
    activity?: string;
    moodPreference?: string;
    season?: string;
    energyPreference?: string;
    durationMinutes?: number;
    startTrackId?: string;
    allowRepeats?: boolean;
    minCompatibility?: number;
}

export interface GenerationInfo {
    algorithm: "contextual_multi_factor";
    curveUsed: string;
    iterations: number;
    fallbackSelections: number;
    perfectMatches: number;
    contextMismatches: number;
}

export interface PlaylistGenerationResult {
    playlist: Track[];
    curve: ContextualCurve;
    energyProgression: number[];
    trackScores: number[];
    generationInfo: GenerationInfo;
    totalScore: number;
}

export interface PlaylistExplanation {
    curveInfo: {
        name: string;
        type: ContextType;
        shape: CurveShape;
        energyRange: [number, number];
        durationMinutes: number;
    };
    generationStats: GenerationInfo;
    energyFlow: {
        progression: number[];
        trackScores: number[];
        averageScore: number;
    };
    recommendations: string[];
}

export interface ContextualPlaylistGeneratorOptions {
    harmonicEngine?: HarmonicMixingEngine;
    stylisticMatrix?: StylisticCompatibilityMatrix;
    curveEngine?: ContextualCurveEngine;
    /** Seed for the energy noise and the variation shuffles. */
    seed?: string;
}

interface ScoredTrack {
    track: Track;
    score: number;
}

/** First track with the highest score; `null` for an empty list. */
function argmax(tracks: Track[], scoreOf: (track: Track) => number): ScoredTrack | null {
    let best: ScoredTrack | null = null;
    for (const track of tracks) {
        const score = scoreOf(track);
        if (!best || score > best.score) {
            best = { track, score };
        }
    }
    return best;
}

function sameStyleValue(a: unknown, b: unknown): boolean {
    const left = normalizeStyleString(a);
    return left !== undefined && left === normalizeStyleString(b);
}

export function calculateVarietyScore(
    current: TrackMetadata | undefined,
    candidate: TrackMetadata | undefined,
): number {
    let variety = 1.0;
    if (sameStyleValue(current?.subgenre, candidate?.subgenre)) {
        variety -= 0.2;
    }
    if (sameStyleValue(current?.mood, candidate?.mood)) {
        variety -= 0.1;
    }
    if (sameStyleValue(current?.era, candidate?.era)) {
        variety -= 0.1;
    }
    return Math.max(0, variety);
}

/** Closeness to the target energy, blended with a smooth step from the current track. */
export function calculateEnergyProgressionScore(
    current: TrackMetadata | undefined,
    candidate: TrackMetadata | undefined,
    targetEnergy: number,
): number {
    const currentEnergy = normalizePercentage(current?.danceability ?? 0.5);
    const candidateEnergy = normalizePercentage(candidate?.danceability ?? 0.5);
    if (currentEnergy === undefined || candidateEnergy === undefined) {
        return 0.5;
    }

    const targetMatch = 1.0 - Math.abs(candidateEnergy - targetEnergy);
    const transition = 1.0 - Math.min(Math.abs(candidateEnergy - currentEnergy), 0.3) / 0.3;
    return targetMatch * 0.7 + transition * 0.3;
}

export class ContextualPlaylistGenerator {
    private readonly harmonicEngine: HarmonicMixingEngine;
    private readonly stylisticMatrix: StylisticCompatibilityMatrix;
    private readonly curveEngine: ContextualCurveEngine;
    private readonly seed: string;

    constructor(options: ContextualPlaylistGeneratorOptions = {}) {
        this.harmonicEngine = options.harmonicEngine ?? new HarmonicMixingEngine();
        this.stylisticMatrix = options.stylisticMatrix ?? stylisticCompatibilityMatrix;
        this.curveEngine = options.curveEngine ?? contextualCurveEngine;
        this.seed = options.seed ?? "mixflow";
    }

    generateContextualPlaylist(request: PlaylistGenerationRequest): PlaylistGenerationResult {
        return this.generateWithRng(request, createRngFromKey(`${this.seed}-progression`));
    }

    /**
     * Repeats generation with a relaxed threshold and a shuffled pool for
     * every run after the first. Empty runs are dropped.
     */
    generateMultiplePlaylists(
        request: PlaylistGenerationRequest,
        count: number = DEFAULT_VARIATION_COUNT,
    ): PlaylistGenerationResult[] {
        const baseMinimum = request.minCompatibility ?? DEFAULT_MIN_COMPATIBILITY;
        const results: PlaylistGenerationResult[] = [];

        for (let i = 0; i < count; i++) {
            const rng = createRngFromKey(`${this.seed}-variation-${i}`);
            const result = this.generateWithRng(
                {
                    ...request,
                    tracks: i > 0 ? shuffleWithRng(request.tracks, rng) : [...request.tracks],
                    startTrackId: undefined,
                    minCompatibility: Math.max(
                        MIN_RELAXED_COMPATIBILITY,
                        baseMinimum - RELAXATION_STEP * i,
                    ),
                },
                rng,
            );
            if (result.playlist.length > 0) {
                results.push(result);
            }
        }

        return results.sort((a, b) => b.totalScore - a.totalScore);
    }

    explainPlaylistGeneration(result: PlaylistGenerationResult): PlaylistExplanation {
        const { curve, generationInfo } = result;
        const length = result.playlist.length;
        const recommendations: string[] = [];

        if (generationInfo.contextMismatches > length * 0.3) {
            recommendations.push(
                "Consider adjusting context parameters - some tracks don't fit the selected context well",
            );
        }
        if (generationInfo.fallbackSelections > length * 0.2) {
            recommendations.push(
                "Some tracks were selected as fallbacks - consider expanding your music library for this context",
            );
        }
        if (result.totalScore < 0.6) {
            recommendations.push(
                "Overall compatibility could be improved - consider using different starting track or context",
            );
        }

        return {
            curveInfo: {
                name: curve.name,
                type: curve.contextType,
                shape: curve.shape,
                energyRange: [...curve.energyRange],
                durationMinutes: curve.durationMinutes,
            },
            generationStats: { ...generationInfo },
            energyFlow: {
                progression: [...result.energyProgression],
                trackScores: [...result.trackScores],
                averageScore: result.totalScore,
            },
            recommendations,
        };
    }

    private generateWithRng(request: PlaylistGenerationRequest, rng: Rng): PlaylistGenerationResult {
        const curve = this.curveEngine.selectContextualCurve({
            timeOfDay: request.timeOfDay,
            activity: request.activity,
            energyPreference: request.energyPreference,
            moodPreference: request.moodPreference,
            season: request.season,
            durationMinutes: request.durationMinutes,
        });
        const targetLength = request.targetLength ?? DEFAULT_TARGET_LENGTH;
        const energyProgression = this.curveEngine.generateEnergyProgression(
            curve,
            targetLength,
            rng,
        );

        const { playlist, trackScores, generationInfo } = withLogTiming(
            log,
            "Contextual playlist generation",
            () => this.sequence(request, curve, energyProgression, targetLength),
            { curve: curve.id, poolSize: request.tracks.length, targetLength },
        );

        return {
            playlist,
            curve,
            energyProgression,
            trackScores,
            generationInfo,
            totalScore:
                trackScores.length > 0
                    ? trackScores.reduce((sum, score) => sum + score, 0) / trackScores.length
                    : 0.0,
        };
    }

    private sequence(
        request: PlaylistGenerationRequest,
        curve: ContextualCurve,
        energyProgression: number[],
        targetLength: number,
    ) {
        const metadata = request.metadata ?? {};
        const allowRepeats = request.allowRepeats ?? false;
        const minCompatibility = request.minCompatibility ?? DEFAULT_MIN_COMPATIBILITY;
        const generationInfo: GenerationInfo = {
            algorithm: "contextual_multi_factor",
            curveUsed: curve.name,
            iterations: 0,
            fallbackSelections: 0,
            perfectMatches: 0,
            contextMismatches: 0,
        };
        const playlist: Track[] = [];
        const trackScores: number[] = [];

        const pool = request.tracks.filter((track) => track.isAvailable !== false);
        if (targetLength <= 0 || pool.length === 0) {
            return { playlist, trackScores, generationInfo };
        }

        const contextScore = (track: Track, targetEnergy: number) =>
            this.curveEngine.calculateTrackContextScore(metadata[track.id], curve, targetEnergy);

        const firstEnergy = energyProgression[0] ?? 0.5;
        const requestedStart = request.startTrackId
            ? pool.find((track) => track.id === request.startTrackId)
            : undefined;
        const start =
            requestedStart ??
            argmax(pool, (track) => this.startScore(track, metadata[track.id], curve, firstEnergy))
                ?.track;
        if (!start) {
            return { playlist, trackScores, generationInfo };
        }

        playlist.push(start);
        trackScores.push(contextScore(start, firstEnergy));
        let current = start;
        let remaining = pool.filter((track) => track.id !== start.id);
        const maxLength = allowRepeats ? targetLength : Math.min(targetLength, pool.length);

        for (let position = 1; position < maxLength; position++) {
            const candidates = allowRepeats
                ? pool.filter((track) => track.id !== current.id)
                : remaining;
            if (candidates.length === 0) {
                break;
            }
            generationInfo.iterations += 1;

            const targetEnergy = energyProgression[position] ?? 0.5;
            const from = current;
            const best = argmax(candidates, (candidate) =>
                this.comprehensiveScore(from, candidate, metadata, curve, targetEnergy),
            );
            if (!best) {
                break;
            }

            let chosen: ScoredTrack = best;
            if (best.score >= minCompatibility) {
                if (best.score > PERFECT_MATCH_THRESHOLD) {
                    generationInfo.perfectMatches += 1;
                }
            } else {
                chosen =
                    argmax(candidates, (candidate) => contextScore(candidate, targetEnergy)) ??
                    best;
                generationInfo.fallbackSelections += 1;
                log.debug(
                    `Position ${position}: best score ${best.score.toFixed(3)} below ${minCompatibility}, using ${chosen.track.id}`,
                );
            }

            if (contextScore(chosen.track, targetEnergy) < CONTEXT_MISMATCH_THRESHOLD) {
                generationInfo.contextMismatches += 1;
            }

            playlist.push(chosen.track);
            trackScores.push(chosen.score);
            current = chosen.track;
            remaining = remaining.filter((track) => track.id !== chosen.track.id);
        }

        return { playlist, trackScores, generationInfo };
    }

    private startScore(
        track: Track,
        metadata: TrackMetadata | undefined,
        curve: ContextualCurve,
        targetEnergy: number,
    ): number {
        let bonus = 0;
        if (curve.contextType === "time" && INTRO_CURVES.includes(curve.contextValue)) {
            const mixFriendly = normalizePercentage(metadata?.mix_friendly);
            if (mixFriendly !== undefined && mixFriendly > INTRO_FRIENDLY_THRESHOLD) {
                bonus = INTRO_BONUS;
            }
        }
        return this.curveEngine.calculateTrackContextScore(metadata, curve, targetEnergy) + bonus;
    }

    private comprehensiveScore(
        current: Track,
        candidate: Track,
        metadata: TrackMetadataMap,
        curve: ContextualCurve,
        targetEnergy: number,
    ): number {
        const currentMetadata = metadata[current.id];
        const candidateMetadata = metadata[candidate.id];

        const harmonic = this.harmonicEngine.calculateCompatibility(current, candidate);
        const stylistic = this.stylisticMatrix.calculateStylisticCompatibility(
            this.stylisticMatrix.extractStyleProfile(currentMetadata),
            this.stylisticMatrix.extractStyleProfile(candidateMetadata),
        );
        const contextualFit = this.curveEngine.calculateTrackContextScore(
            candidateMetadata,
            curve,
            targetEnergy,
        );
        const energy = calculateEnergyProgressionScore(
            currentMetadata,
            candidateMetadata,
            targetEnergy,
        );
        const variety = calculateVarietyScore(currentMetadata, candidateMetadata);

        return (
            GENERATION_WEIGHTS.harmonic * harmonic +
            GENERATION_WEIGHTS.stylistic * stylistic +
            GENERATION_WEIGHTS.contextualFit * contextualFit +
            GENERATION_WEIGHTS.energyProgression * energy +
            GENERATION_WEIGHTS.variety * variety
        );
    }
}
