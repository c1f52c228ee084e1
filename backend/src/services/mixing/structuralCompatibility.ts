/**
 * Structural compatibility between two analysed tracks.
 *
 * Consumes `StructuralAnalysis` records produced by the audio-analysis
 * pipeline. Every score falls back to 0.5 when the data it needs is missing.
 */

import type {
    EnergySample,
    StructuralAnalysis,
    StructuralElement,
    TransitionPoint,
} from "@mixflow/track-analysis-contract";
import { calculateBpmScore } from "./harmonicEngine";

const NEUTRAL_SCORE = 0.5;
const ENERGY_WINDOW_SECONDS = 30;
const TRANSITION_SEARCH_DEPTH = 5;
const MAX_RANKED_TRANSITION_POINTS = 20;
const MIN_KEPT_SUITABILITY = 0.3;

export const ELEMENT_MIX_MODIFIERS: Record<StructuralElement, number> = {
    intro: 0.9,
    verse: 0.8,
    chorus: 0.7,
    bridge: 0.6,
    outro: 0.9,
    break: 0.95,
    buildup: 0.3,
    drop: 0.4,
};

/** Outgoing element -> incoming element -> score. Unlisted pairs score 0.5. */
export const ELEMENT_TRANSITION_SCORES: Partial<
    Record<StructuralElement, Partial<Record<StructuralElement, number>>>
> = {
    outro: { intro: 1.0, verse: 0.8, break: 0.9 },
    break: { verse: 0.9, chorus: 0.7, buildup: 0.8 },
    verse: { verse: 0.8, chorus: 0.6, intro: 0.7 },
};

export interface TransitionPairEvaluation {
    outPoint: TransitionPoint;
    inPoint: TransitionPoint;
    quality: number;
    estimatedMixDuration: number;
}

export function computeMixSuitability(
    stability: number,
    beatStrength: number,
    element: StructuralElement,
): number {
    return (stability * 0.6 + beatStrength * 0.4) * ELEMENT_MIX_MODIFIERS[element];
}

export function classifyStructuralElement(
    timeSeconds: number,
    duration: number,
    energy: number,
): StructuralElement {
    const position = duration > 0 ? timeSeconds / duration : 0;

    if (position < 0.15) {
        return "intro";
    }
    if (position > 0.85) {
        return "outro";
    }
    if (energy > 0.5) {
        return position > 0.3 && position < 0.7 ? "chorus" : "buildup";
    }
    return "verse";
}

/** Drops weak points and orders the rest best-first, as the scorer expects. */
export function rankTransitionPoints(points: TransitionPoint[]): TransitionPoint[] {
    return points
        .filter((point) => point.mixSuitability > MIN_KEPT_SUITABILITY)
        .sort((a, b) => b.mixSuitability - a.mixSuitability)
        .slice(0, MAX_RANKED_TRANSITION_POINTS);
}

function highestSuitability(points: TransitionPoint[]): TransitionPoint | null {
    let best: TransitionPoint | null = null;
    for (const point of points) {
        if (!best || point.mixSuitability > best.mixSuitability) {
            best = point;
        }
    }
    return best;
}

/**
 * Closest strong point (suitability above 0.6) within 30s of the target,
 * otherwise the most suitable point overall.
 */
export function getBestMixOutPoint(
    analysis: StructuralAnalysis,
    targetTime?: number,
): TransitionPoint | null {
    const points = analysis.transitionPoints;
    if (points.length === 0) {
        return null;
    }

    if (targetTime !== undefined) {
        let closest: TransitionPoint | null = null;
        for (const point of points) {
            const distance = Math.abs(point.timeSeconds - targetTime);
            if (point.mixSuitability <= 0.6 || distance >= 30) {
                continue;
            }
            if (!closest || distance < Math.abs(closest.timeSeconds - targetTime)) {
                closest = point;
            }
        }
        if (closest) {
            return closest;
        }
    }

    return highestSuitability(points);
}

/** Prefers points between the intro and 30s before the outro. */
export function getBestMixInPoint(analysis: StructuralAnalysis): TransitionPoint | null {
    const points = analysis.transitionPoints;
    if (points.length === 0) {
        return null;
    }

    const introEnd = analysis.introEnd || 0;
    const outroStart = analysis.outroStart || analysis.duration;
    const body = points.filter(
        (point) =>
            point.timeSeconds > introEnd &&
            point.timeSeconds < outroStart - 30 &&
            point.mixSuitability > 0.5,
    );

    return highestSuitability(body.length > 0 ? body : points);
}

function meanBeatInterval(beatGrid: number[]): number {
    if (beatGrid.length < 2) {
        return 0;
    }
    return (beatGrid[beatGrid.length - 1] - beatGrid[0]) / (beatGrid.length - 1);
}

function meanEnergyInRange(curve: EnergySample[], start: number, end: number): number {
    const samples = curve
        .filter(([time]) => time >= start && time <= end)
        .map(([, energy]) => energy);
    if (samples.length === 0) {
        return NEUTRAL_SCORE;
    }
    return samples.reduce((sum, energy) => sum + energy, 0) / samples.length;
}

function tempoStability(analysis: StructuralAnalysis): number {
    const minutes = analysis.duration / 60;
    const changes = analysis.tempoChanges.length;
    if (minutes <= 0) {
        return changes === 0 ? 1 : 0;
    }
    return 1 - Math.min(changes / minutes, 1);
}

export function scoreRemainingTime(remainingSeconds: number): number {
    if (remainingSeconds >= 15 && remainingSeconds <= 45) {
        return 1.0;
    }
    return Math.max(0, 1.0 - Math.abs(remainingSeconds - 30) / 30);
}

export function scoreIntroTime(introSeconds: number): number {
    return introSeconds >= 10 ? 1.0 : introSeconds / 10;
}

export function estimateMixDuration(outPoint: TransitionPoint, inPoint: TransitionPoint): number {
    let duration = 16;

    if (Math.abs(outPoint.energyLevel - inPoint.energyLevel) > 0.3) {
        duration += 8;
    }

    const minBeatStrength = Math.min(outPoint.beatStrength, inPoint.beatStrength);
    if (minBeatStrength > 0.7) {
        duration -= 4;
    } else if (minBeatStrength < 0.3) {
        duration += 8;
    }

    return Math.max(8, Math.min(32, duration));
}

export class StructuralCompatibilityScorer {
    durationScore(structural1: StructuralAnalysis, structural2: StructuralAnalysis): number {
        const longest = Math.max(structural1.duration, structural2.duration);
        if (longest <= 0) {
            return NEUTRAL_SCORE;
        }
        return Math.min(structural1.duration, structural2.duration) / longest;
    }

    /** Tempo score between the BPMs implied by each beat grid. */
    beatScore(structural1: StructuralAnalysis, structural2: StructuralAnalysis): number {
        if (structural1.beatGrid.length === 0 || structural2.beatGrid.length === 0) {
            return NEUTRAL_SCORE;
        }

        const interval1 = meanBeatInterval(structural1.beatGrid);
        const interval2 = meanBeatInterval(structural2.beatGrid);
        if (interval1 <= 0 || interval2 <= 0) {
            return NEUTRAL_SCORE;
        }

        return calculateBpmScore(60 / interval1, 60 / interval2);
    }

    /** Outro energy of the outgoing track against intro energy of the incoming one. */
    energyContinuityScore(
        structural1: StructuralAnalysis,
        structural2: StructuralAnalysis,
    ): number {
        if (structural1.energyCurve.length === 0 || structural2.energyCurve.length === 0) {
            return NEUTRAL_SCORE;
        }

        const outroEnergy = meanEnergyInRange(
            structural1.energyCurve,
            Math.max(0, structural1.duration - ENERGY_WINDOW_SECONDS),
            structural1.duration,
        );
        const introEnergy = meanEnergyInRange(
            structural2.energyCurve,
            0,
            Math.min(ENERGY_WINDOW_SECONDS, structural2.duration),
        );

        return Math.max(0, 1.0 - Math.abs(outroEnergy - introEnergy));
    }

    calculateStructuralScore(
        structural1?: StructuralAnalysis | null,
        structural2?: StructuralAnalysis | null,
    ): number {
        if (!structural1 || !structural2) {
            return NEUTRAL_SCORE;
        }
        return (
            this.durationScore(structural1, structural2) * 0.3 +
            this.beatScore(structural1, structural2) * 0.4 +
            this.energyContinuityScore(structural1, structural2) * 0.3
        );
    }

    calculateTransitionQuality(
        structural1?: StructuralAnalysis | null,
        structural2?: StructuralAnalysis | null,
    ): number {
        const bestOut = structural1 ? highestSuitability(structural1.transitionPoints) : null;
        const bestIn = structural2 ? highestSuitability(structural2.transitionPoints) : null;
        if (!bestOut || !bestIn) {
            return NEUTRAL_SCORE;
        }
        return (bestOut.mixSuitability + bestIn.mixSuitability) / 2;
    }

    tempoStabilityScore(structural1: StructuralAnalysis, structural2: StructuralAnalysis): number {
        return (tempoStability(structural1) + tempoStability(structural2)) / 2;
    }

    elementMatchingScore(structural1: StructuralAnalysis, structural2: StructuralAnalysis): number {
        if (
            structural1.transitionPoints.length === 0 ||
            structural2.transitionPoints.length === 0
        ) {
            return NEUTRAL_SCORE;
        }

        let best = 0;
        for (const outPoint of structural1.transitionPoints) {
            const row = ELEMENT_TRANSITION_SCORES[outPoint.elementType];
            for (const inPoint of structural2.transitionPoints) {
                best = Math.max(best, row?.[inPoint.elementType] ?? NEUTRAL_SCORE);
            }
        }
        return best;
    }

    timingFeasibilityScore(
        structural1: StructuralAnalysis,
        structural2: StructuralAnalysis,
    ): number {
        const bestOut = highestSuitability(structural1.transitionPoints);
        const bestIn = highestSuitability(structural2.transitionPoints);
        if (!bestOut || !bestIn) {
            return NEUTRAL_SCORE;
        }

        const outScore = scoreRemainingTime(structural1.duration - bestOut.timeSeconds);
        const inScore = scoreIntroTime(bestIn.timeSeconds);
        return (outScore + inScore) / 2;
    }

    calculateTemporalScore(
        structural1?: StructuralAnalysis | null,
        structural2?: StructuralAnalysis | null,
    ): number {
        if (!structural1 || !structural2) {
            return NEUTRAL_SCORE;
        }
        return (
            this.tempoStabilityScore(structural1, structural2) * 0.4 +
            this.elementMatchingScore(structural1, structural2) * 0.3 +
            this.timingFeasibilityScore(structural1, structural2) * 0.3
        );
    }

    evaluateTransitionPair(
        outPoint: TransitionPoint,
        inPoint: TransitionPoint,
        structural1: StructuralAnalysis,
    ): number {
        const pointQuality = (outPoint.mixSuitability + inPoint.mixSuitability) / 2;
        const timing = scoreRemainingTime(structural1.duration - outPoint.timeSeconds);
        const energyMatch = Math.max(
            0,
            1.0 - Math.abs(outPoint.energyLevel - inPoint.energyLevel),
        );
        const beatMatch = Math.min(outPoint.beatStrength, inPoint.beatStrength);

        return pointQuality * 0.4 + timing * 0.3 + energyMatch * 0.2 + beatMatch * 0.1;
    }

    /** Best pair among the top five ranked points on each side. */
    findBestTransitionPair(
        structural1: StructuralAnalysis,
        structural2: StructuralAnalysis,
    ): TransitionPairEvaluation | null {
        let best: TransitionPairEvaluation | null = null;
        let bestQuality = 0;

        for (const outPoint of structural1.transitionPoints.slice(0, TRANSITION_SEARCH_DEPTH)) {
            for (const inPoint of structural2.transitionPoints.slice(0, TRANSITION_SEARCH_DEPTH)) {
                const quality = this.evaluateTransitionPair(outPoint, inPoint, structural1);
                if (quality > bestQuality) {
                    bestQuality = quality;
                    best = {
                        outPoint,
                        inPoint,
                        quality,
                        estimatedMixDuration: estimateMixDuration(outPoint, inPoint),
                    };
                }
            }
        }

        return best;
    }
}

export const structuralCompatibilityScorer = new StructuralCompatibilityScorer();
