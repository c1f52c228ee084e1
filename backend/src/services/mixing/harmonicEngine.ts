/**
 * Harmonic Mixing Engine
 *
 * Scores a pair of tracks on Camelot key, tempo, energy and emotional
 * intensity, and builds simple greedy playlists from those scores.
 */

import {
    camelotWheelDistance,
    formatCamelotKey,
    isPresentNumber,
    parseCamelotKey,
} from "@mixflow/track-analysis-contract";
import type {
    StructuralAnalysis,
    Track,
    TrackMetadata,
} from "@mixflow/track-analysis-contract";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("Mixing.Harmonic");

export const MIX_MODE_VALUES = [
    "classic",
    "energy",
    "emotional",
    "structural",
    "intelligent",
] as const;

export type MixMode = (typeof MIX_MODE_VALUES)[number];

export const PROGRESSION_CURVE_VALUES = [
    "neutral",
    "ascending",
    "descending",
] as const;

export type ProgressionCurve = (typeof PROGRESSION_CURVE_VALUES)[number];

export interface HarmonicWeights {
    key: number;
    bpm: number;
    energy: number;
    emotional: number;
}

export const MIX_MODE_WEIGHTS: Record<MixMode, HarmonicWeights> = {
    classic: { key: 0.9, bpm: 0.1, energy: 0, emotional: 0 },
    energy: { key: 0.2, bpm: 0.2, energy: 0.5, emotional: 0.1 },
    emotional: { key: 0.2, bpm: 0.1, energy: 0.2, emotional: 0.5 },
    structural: { key: 0.25, bpm: 0.25, energy: 0.25, emotional: 0.25 },
    intelligent: { key: 0.4, bpm: 0.3, energy: 0.2, emotional: 0.1 },
};

export const BPM_TOLERANCE = 6;
export const ENERGY_TOLERANCE = 2;
const PLAYLIST_MIN_SCORE = 0.3;
const PROGRESSION_BOOST = 1.2;

/**
 * Optional richer scorer the engine delegates to when one is injected.
 * Implemented by the enhanced compatibility engine.
 */
export interface EnhancedPairScorer {
    calculateEnhancedCompatibility(
        track1: Track,
        track2: Track,
        structural1?: StructuralAnalysis | null,
        structural2?: StructuralAnalysis | null,
        metadata1?: TrackMetadata | null,
        metadata2?: TrackMetadata | null,
    ): number;
}

export interface PairData<T> {
    track1?: T | null;
    track2?: T | null;
}

export interface HarmonicMixingEngineOptions {
    mode?: MixMode;
    enhancedScorer?: EnhancedPairScorer;
}

/**
 * Same key, both wheel neighbours and the relative major/minor.
 * Malformed keys have no compatible keys.
 */
export function getCompatibleKeys(key: string | null | undefined): string[] {
    const parsed = parseCamelotKey(key);
    if (!parsed) {
        return [];
    }

    const { number, letter } = parsed;
    const previous = number === 1 ? 12 : number - 1;
    const next = number === 12 ? 1 : number + 1;

    return [
        formatCamelotKey(parsed),
        `${previous}${letter}`,
        `${next}${letter}`,
        `${number}${letter === "A" ? "B" : "A"}`,
    ];
}

export function calculateKeyScore(key1: string, key2: string): number {
    const parsed1 = parseCamelotKey(key1);
    const parsed2 = parseCamelotKey(key2);
    if (!parsed1 || !parsed2) {
        return 0;
    }

    const normalized2 = formatCamelotKey(parsed2);
    if (formatCamelotKey(parsed1) === normalized2) {
        return 1.0;
    }

    if (getCompatibleKeys(key1).includes(normalized2)) {
        return 0.8;
    }

    // Unreachable: the relative key is already in the compatible set above.
    // Kept until the intended relative-key score is confirmed.
    if (parsed1.number === parsed2.number && parsed1.letter !== parsed2.letter) {
        return 0.7;
    }

    return Math.max(0, 0.5 - camelotWheelDistance(parsed1, parsed2) * 0.1);
}

export function calculateBpmScore(bpm1: number, bpm2: number): number {
    const diff = Math.abs(bpm1 - bpm2);

    if (diff <= 2) {
        return 1.0;
    }
    if (diff <= BPM_TOLERANCE) {
        return 1.0 - (diff / BPM_TOLERANCE) * 0.5;
    }
    // Half/double time
    if (Math.abs(bpm1 * 2 - bpm2) <= 4 || Math.abs(bpm1 - bpm2 * 2) <= 4) {
        return 0.6;
    }
    return Math.max(0, 0.3 - (diff - BPM_TOLERANCE) * 0.02);
}

export function calculateEnergyScore(energy1: number, energy2: number): number {
    const diff = Math.abs(energy1 - energy2);

    if (diff <= 1) {
        return 1.0;
    }
    if (diff <= ENERGY_TOLERANCE) {
        return 0.8;
    }
    return Math.max(0, 0.5 - (diff - ENERGY_TOLERANCE) * 0.1);
}

export function calculateEmotionalScore(emotion1: number, emotion2: number): number {
    return Math.max(0, 1.0 - Math.abs(emotion1 - emotion2) / 10);
}

export function isMixMode(value: unknown): value is MixMode {
    return MIX_MODE_VALUES.some((mode) => mode === value);
}

function validateWeights(weights: HarmonicWeights): HarmonicWeights {
    const entries = Object.entries(weights);
    const invalid = entries.filter(
        ([, value]) => !Number.isFinite(value) || value < 0,
    );
    if (invalid.length > 0) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.RECOVERABLE,
            "Harmonic weights must be finite and non-negative",
            { fields: invalid.map(([name]) => name) },
        );
    }
    return { ...weights };
}

export class HarmonicMixingEngine {
    private mode: MixMode = "intelligent";
    private weights: HarmonicWeights = { ...MIX_MODE_WEIGHTS.intelligent };
    private readonly enhancedScorer?: EnhancedPairScorer;

    constructor(options: HarmonicMixingEngineOptions = {}) {
        this.enhancedScorer = options.enhancedScorer;
        if (options.mode) {
            this.setMode(options.mode);
        }
    }

    setMode(mode: MixMode): void {
        this.mode = mode;
        this.weights = { ...MIX_MODE_WEIGHTS[mode] };
    }

    getMode(): MixMode {
        return this.mode;
    }

    setWeights(weights: HarmonicWeights): void {
        this.weights = validateWeights(weights);
    }

    getWeights(): HarmonicWeights {
        return { ...this.weights };
    }

    /**
     * Weighted sum over the dimensions present on both tracks. Missing
     * dimensions contribute nothing and the total is not renormalized.
     */
    calculateCompatibility(
        track1: Track,
        track2: Track,
        weights: HarmonicWeights = this.weights,
    ): number {
        let score = 0;

        if (track1.key && track2.key) {
            score += weights.key * calculateKeyScore(track1.key, track2.key);
        }

        if (isPresentNumber(track1.bpm) && isPresentNumber(track2.bpm)) {
            score += weights.bpm * calculateBpmScore(track1.bpm, track2.bpm);
        }

        if (isPresentNumber(track1.energy) && isPresentNumber(track2.energy)) {
            score +=
                weights.energy * calculateEnergyScore(track1.energy, track2.energy);
        }

        if (
            isPresentNumber(track1.emotionalIntensity) &&
            isPresentNumber(track2.emotionalIntensity)
        ) {
            score +=
                weights.emotional *
                calculateEmotionalScore(
                    track1.emotionalIntensity,
                    track2.emotionalIntensity,
                );
        }

        return Math.min(score, 1.0);
    }

    /**
     * Greedy chain from the start track. Stops early once no remaining
     * track scores above the minimum threshold.
     */
    generatePlaylist(
        tracks: Track[],
        startTrack?: Track | null,
        targetLength: number = 10,
        progressionCurve: ProgressionCurve = "neutral",
    ): Track[] {
        if (tracks.length === 0) {
            return [];
        }

        const start = startTrack ?? tracks[0];
        if (!tracks.some((track) => track.id === start.id)) {
            log.debug(`Start track ${start.id} not in pool`);
            return [];
        }

        const playlist: Track[] = [start];
        let remaining = tracks.filter((track) => track.id !== start.id);

        while (playlist.length < targetLength && remaining.length > 0) {
            const current = playlist[playlist.length - 1];
            let best: Track | null = null;
            let bestScore = Number.NEGATIVE_INFINITY;

            for (const candidate of remaining) {
                const score =
                    this.calculateCompatibility(current, candidate) *
                    this.progressionModifier(current, candidate, progressionCurve);
                if (score > bestScore) {
                    best = candidate;
                    bestScore = score;
                }
            }

            if (!best || bestScore <= PLAYLIST_MIN_SCORE) {
                break;
            }

            const chosen = best;
            playlist.push(chosen);
            remaining = remaining.filter((track) => track.id !== chosen.id);
        }

        log.debug(
            `Generated ${playlist.length}/${targetLength} tracks (${progressionCurve}, ${this.mode})`,
        );
        return playlist;
    }

    buildCompatibilityMatrix(tracks: Track[]): number[][] {
        return tracks.map((rowTrack, i) =>
            tracks.map((columnTrack, j) =>
                i === j ? 0 : this.calculateCompatibility(rowTrack, columnTrack),
            ),
        );
    }

    /** Falls back to the base score when no enhanced scorer was injected. */
    calculateEnhancedCompatibility(
        track1: Track,
        track2: Track,
        structuralData?: PairData<StructuralAnalysis>,
        enhancedMetadata?: PairData<TrackMetadata>,
    ): number {
        if (!this.enhancedScorer) {
            return this.calculateCompatibility(track1, track2);
        }

        return this.enhancedScorer.calculateEnhancedCompatibility(
            track1,
            track2,
            structuralData?.track1,
            structuralData?.track2,
            enhancedMetadata?.track1,
            enhancedMetadata?.track2,
        );
    }

    supportsEnhancedScoring(): boolean {
        return this.enhancedScorer !== undefined;
    }

    private progressionModifier(
        current: Track,
        candidate: Track,
        curve: ProgressionCurve,
    ): number {
        if (
            curve === "neutral" ||
            !isPresentNumber(candidate.energy) ||
            !isPresentNumber(current.energy)
        ) {
            return 1;
        }
        if (curve === "ascending" && candidate.energy > current.energy) {
            return PROGRESSION_BOOST;
        }
        if (curve === "descending" && candidate.energy < current.energy) {
            return PROGRESSION_BOOST;
        }
        return 1;
    }
}
