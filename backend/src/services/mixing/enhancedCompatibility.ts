/**
 * Enhanced compatibility: blends the harmonic score with stylistic,
 * structural, transition and temporal scores, and optionally with a mixing
 * policy's verdict on the incoming track.
 */

import { isPresentNumber } from "@mixflow/track-analysis-contract";
import type {
    StructuralAnalysis,
    Track,
    TrackMetadata,
    TransitionPoint,
} from "@mixflow/track-analysis-contract";
import { PolicyNotFoundError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import type { PolicyManager } from "../policies/policyManager";
import { PolicyRuleEngine, policyRuleEngine } from "../policies/policyRuleEngine";
import type { PolicyContext } from "../policies/policyTypes";
import { EnhancedPairScorer, HarmonicMixingEngine } from "./harmonicEngine";
import {
    StructuralCompatibilityScorer,
    structuralCompatibilityScorer,
} from "./structuralCompatibility";
import {
    BridgeCandidate,
    BridgeSuggestion,
    StyleBreakdown,
    StyleProfile,
    StylisticCompatibilityMatrix,
    stylisticCompatibilityMatrix,
} from "./stylisticCompatibility";

const log = createLogger("Mixing.Enhanced");

const NEUTRAL_SCORE = 0.5;
export const DEFAULT_POLICY_WEIGHT = 0.2;

export const ENHANCED_WEIGHTS = {
    harmonic: 0.25,
    stylistic: 0.25,
    structural: 0.2,
    transition: 0.2,
    temporal: 0.1,
} as const;

export interface MixTransition {
    trackFrom: Track;
    trackTo: Track;
    outPoint: TransitionPoint;
    inPoint: TransitionPoint;
    compatibilityScore: number;
    transitionQuality: number;
    estimatedMixDuration: number;
}

export interface HarmonicExplanation {
    score: number;
    keyMatch: string;
    bpmMatch: string;
    energyMatch: string;
}

export interface StylisticExplanation {
    score: number;
    subgenreMatch: string;
    moodMatch: string;
    eraMatch: string;
    languageMatch: string;
    breakdown: StyleBreakdown;
}

export interface CompatibilityExplanation {
    overallScore: number;
    harmonic: HarmonicExplanation;
    stylistic?: StylisticExplanation;
    recommendations: string[];
}

export interface PolicyAwareOptions {
    structural1?: StructuralAnalysis | null;
    structural2?: StructuralAnalysis | null;
    metadata1?: TrackMetadata | null;
    metadata2?: TrackMetadata | null;
    policyId?: string;
    context?: PolicyContext | null;
}

export interface EnhancedCompatibilityEngineOptions {
    baseEngine?: HarmonicMixingEngine;
    stylisticMatrix?: StylisticCompatibilityMatrix;
    structuralScorer?: StructuralCompatibilityScorer;
    policyManager?: PolicyManager;
    ruleEngine?: PolicyRuleEngine;
    policyWeight?: number;
}

function describeChange(from: string | undefined, to: string | undefined): string {
    return `${from ?? "unknown"} → ${to ?? "unknown"}`;
}

export class EnhancedCompatibilityEngine implements EnhancedPairScorer {
    private readonly baseEngine: HarmonicMixingEngine;
    private readonly stylisticMatrix: StylisticCompatibilityMatrix;
    private readonly structuralScorer: StructuralCompatibilityScorer;
    private readonly policyManager?: PolicyManager;
    private readonly ruleEngine: PolicyRuleEngine;
    private readonly policyWeight: number;

    constructor(options: EnhancedCompatibilityEngineOptions = {}) {
        this.baseEngine = options.baseEngine ?? new HarmonicMixingEngine();
        this.stylisticMatrix = options.stylisticMatrix ?? stylisticCompatibilityMatrix;
        this.structuralScorer = options.structuralScorer ?? structuralCompatibilityScorer;
        this.policyManager = options.policyManager;
        this.ruleEngine = options.ruleEngine ?? policyRuleEngine;
        this.policyWeight = options.policyWeight ?? DEFAULT_POLICY_WEIGHT;
    }

    calculateEnhancedCompatibility(
        track1: Track,
        track2: Track,
        structural1?: StructuralAnalysis | null,
        structural2?: StructuralAnalysis | null,
        metadata1?: TrackMetadata | null,
        metadata2?: TrackMetadata | null,
    ): number {
        const harmonic = this.baseEngine.calculateCompatibility(track1, track2);

        const stylistic =
            metadata1 && metadata2
                ? this.stylisticMatrix.calculateStylisticCompatibility(
                      this.stylisticMatrix.extractStyleProfile(metadata1),
                      this.stylisticMatrix.extractStyleProfile(metadata2),
                  )
                : NEUTRAL_SCORE;

        let structural = NEUTRAL_SCORE;
        let transition = NEUTRAL_SCORE;
        let temporal = NEUTRAL_SCORE;
        if (structural1 && structural2) {
            structural = this.structuralScorer.calculateStructuralScore(structural1, structural2);
            transition = this.structuralScorer.calculateTransitionQuality(
                structural1,
                structural2,
            );
            temporal = this.structuralScorer.calculateTemporalScore(structural1, structural2);
        }

        const score =
            ENHANCED_WEIGHTS.harmonic * harmonic +
            ENHANCED_WEIGHTS.stylistic * stylistic +
            ENHANCED_WEIGHTS.structural * structural +
            ENHANCED_WEIGHTS.transition * transition +
            ENHANCED_WEIGHTS.temporal * temporal;

        return Math.min(score, 1.0);
    }

    /**
     * Enhanced score blended with the policy score of the incoming track.
     * Without a policy id this is the enhanced score.
     */
    calculatePolicyAwareCompatibility(
        track1: Track,
        track2: Track,
        options: PolicyAwareOptions = {},
    ): number {
        const enhanced = this.calculateEnhancedCompatibility(
            track1,
            track2,
            options.structural1,
            options.structural2,
            options.metadata1,
            options.metadata2,
        );
        if (!options.policyId) {
            return enhanced;
        }

        const policy = this.policyManager?.getPolicy(options.policyId);
        if (!policy) {
            throw new PolicyNotFoundError(options.policyId);
        }

        const policyResult = this.ruleEngine.applyPolicyToTrack(
            policy,
            track2,
            options.metadata2,
            options.context,
        );
        log.debug(`Policy ${policy.id} scored ${track2.id} at ${policyResult.totalScore}`);

        return (1 - this.policyWeight) * enhanced + this.policyWeight * policyResult.totalScore;
    }

    findOptimalTransition(
        track1: Track,
        track2: Track,
        structural1: StructuralAnalysis,
        structural2: StructuralAnalysis,
    ): MixTransition | null {
        const pair = this.structuralScorer.findBestTransitionPair(structural1, structural2);
        if (!pair) {
            return null;
        }

        return {
            trackFrom: track1,
            trackTo: track2,
            outPoint: pair.outPoint,
            inPoint: pair.inPoint,
            compatibilityScore: this.calculateEnhancedCompatibility(
                track1,
                track2,
                structural1,
                structural2,
            ),
            transitionQuality: pair.quality,
            estimatedMixDuration: pair.estimatedMixDuration,
        };
    }

    calculateStylisticCompatibilityDetailed(
        metadata1: TrackMetadata,
        metadata2: TrackMetadata,
    ): StyleBreakdown {
        return this.stylisticMatrix.getStyleDistance(
            this.stylisticMatrix.extractStyleProfile(metadata1),
            this.stylisticMatrix.extractStyleProfile(metadata2),
        );
    }

    findStyleBridgeTracks(
        metadata1: TrackMetadata,
        metadata2: TrackMetadata,
        candidates: BridgeCandidate[],
    ): BridgeSuggestion[] {
        return this.stylisticMatrix.suggestBridgeTracks(
            this.stylisticMatrix.extractStyleProfile(metadata1),
            this.stylisticMatrix.extractStyleProfile(metadata2),
            candidates,
        );
    }

    getCompatibilityExplanation(
        track1: Track,
        track2: Track,
        metadata1?: TrackMetadata | null,
        metadata2?: TrackMetadata | null,
    ): CompatibilityExplanation {
        const explanation: CompatibilityExplanation = {
            overallScore: this.calculateEnhancedCompatibility(
                track1,
                track2,
                null,
                null,
                metadata1,
                metadata2,
            ),
            harmonic: {
                score: this.baseEngine.calculateCompatibility(track1, track2),
                keyMatch:
                    track1.key && track2.key ? `${track1.key} → ${track2.key}` : "No key data",
                bpmMatch:
                    isPresentNumber(track1.bpm) && isPresentNumber(track2.bpm)
                        ? `${track1.bpm} → ${track2.bpm} BPM`
                        : "No BPM data",
                energyMatch:
                    isPresentNumber(track1.energy) && isPresentNumber(track2.energy)
                        ? `${track1.energy} → ${track2.energy}`
                        : "No energy data",
            },
            recommendations: [],
        };

        if (!metadata1 || !metadata2) {
            return explanation;
        }

        const profile1 = this.stylisticMatrix.extractStyleProfile(metadata1);
        const profile2 = this.stylisticMatrix.extractStyleProfile(metadata2);
        const score = this.stylisticMatrix.calculateStylisticCompatibility(profile1, profile2);
        const breakdown = this.stylisticMatrix.getStyleDistance(profile1, profile2);

        explanation.stylistic = {
            score,
            ...describeProfiles(profile1, profile2),
            breakdown,
        };

        if (score < 0.5) {
            explanation.recommendations.push(
                "Consider using a bridge track for smoother transition",
            );
        }
        if ((breakdown.mood ?? 0) < 0.5) {
            explanation.recommendations.push(
                "Mood mismatch - consider gradual energy transition",
            );
        }
        if ((breakdown.era ?? 0) < 0.5) {
            explanation.recommendations.push("Era mismatch - may create temporal disconnect");
        }

        return explanation;
    }
}

function describeProfiles(profile1: StyleProfile, profile2: StyleProfile) {
    return {
        subgenreMatch: describeChange(profile1.subgenre, profile2.subgenre),
        moodMatch: describeChange(profile1.mood, profile2.mood),
        eraMatch: describeChange(profile1.era, profile2.era),
        languageMatch: describeChange(profile1.language, profile2.language),
    };
}
