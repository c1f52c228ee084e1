import { config } from "../config";
import { ContextualPlaylistGenerator } from "./mixing/contextualPlaylistGenerator";
import { EnhancedCompatibilityEngine } from "./mixing/enhancedCompatibility";
import { HarmonicMixingEngine } from "./mixing/harmonicEngine";
import { temporalLinguisticSequencer } from "./mixing/temporalLinguisticSequencer";
import { policyManager } from "./policies/policyManager";

/** Process-wide engines wired from config. */
export const enhancedCompatibilityEngine = new EnhancedCompatibilityEngine({
    baseEngine: new HarmonicMixingEngine({ mode: config.mixing.defaultMode }),
    policyManager,
});

export const harmonicMixingEngine = new HarmonicMixingEngine({
    mode: config.mixing.defaultMode,
    enhancedScorer: enhancedCompatibilityEngine,
});

export const contextualPlaylistGenerator = new ContextualPlaylistGenerator({
    harmonicEngine: harmonicMixingEngine,
    seed: config.mixing.randomSeed,
});

export { policyManager, temporalLinguisticSequencer };
