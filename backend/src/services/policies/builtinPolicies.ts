import {
    MixingPolicy,
    PolicyRuleSet,
    createMixingPolicy,
    createPolicyRule,
    createRuleSet,
} from "./policyTypes";

export function buildClassicHarmonicRuleSet(): PolicyRuleSet {
    return createRuleSet({
        id: "classic_harmonic",
        name: "Classic Harmonic Mixing",
        description: "Traditional Camelot wheel harmonic mixing rules",
        rules: [
            createPolicyRule({
                id: "key_compatibility",
                name: "Key Compatibility",
                description: "Tracks should be in compatible keys",
                policyType: "harmonic",
                field: "key",
                operator: "compatible_with",
                value: "adjacent_camelot",
                priority: "high",
                weight: 2.0,
            }),
            createPolicyRule({
                id: "bpm_proximity",
                name: "BPM Proximity",
                description: "BPM should be within 10% range",
                policyType: "energy",
                field: "bpm",
                operator: "within_range",
                value: [0.9, 1.1],
                priority: "medium",
                weight: 1.5,
                tolerance: 5.0,
            }),
        ],
    });
}

export function buildAiStylisticRuleSet(): PolicyRuleSet {
    return createRuleSet({
        id: "ai_stylistic",
        name: "AI-Enhanced Stylistic Matching",
        description: "Stylistic compatibility rules over enrichment metadata",
        rules: [
            createPolicyRule({
                id: "subgenre_compatibility",
                name: "Subgenre Compatibility",
                description: "Subgenres should be compatible",
                policyType: "stylistic",
                field: "subgenre",
                operator: "similar_to",
                value: "compatible_subgenres",
                priority: "high",
                weight: 1.8,
            }),
            createPolicyRule({
                id: "mood_progression",
                name: "Mood Progression",
                description: "Moods should create good progression",
                policyType: "stylistic",
                field: "mood",
                operator: "compatible_with",
                value: "mood_transitions",
                priority: "medium",
                weight: 1.3,
            }),
            createPolicyRule({
                id: "high_danceability",
                name: "High Danceability",
                description: "Maintain high danceability for parties",
                policyType: "quality",
                field: "danceability",
                operator: "greater_equal",
                value: 0.7,
                priority: "medium",
                weight: 1.2,
                adaptive: true,
            }),
        ],
    });
}

export function buildCulturalJourneyRuleSet(): PolicyRuleSet {
    return createRuleSet({
        id: "cultural_journey",
        name: "Cultural Journey Rules",
        description: "Rules for cross-cultural musical journeys",
        rules: [
            createPolicyRule({
                id: "language_bridges",
                name: "Language Bridges",
                description: "Use instrumental tracks to bridge languages",
                policyType: "linguistic",
                field: "language",
                operator: "in_list",
                value: ["instrumental", "spanish", "english"],
                priority: "medium",
                weight: 1.0,
            }),
            createPolicyRule({
                id: "era_progression",
                name: "Era Progression",
                description: "Maintain reasonable era progression",
                policyType: "temporal",
                field: "era",
                operator: "compatible_with",
                value: "era_transitions",
                priority: "low",
                weight: 0.8,
            }),
        ],
    });
}

export interface BuiltinPolicyCatalog {
    policies: MixingPolicy[];
    ruleSets: PolicyRuleSet[];
}

/** Returns fresh copies on every call. */
export function buildBuiltinPolicies(): BuiltinPolicyCatalog {
    const classicHarmonic = buildClassicHarmonicRuleSet();
    const aiStylistic = buildAiStylisticRuleSet();
    const culturalJourney = buildCulturalJourneyRuleSet();

    return {
        policies: [
            createMixingPolicy({
                id: "classic_dj",
                name: "Classic DJ Mixing",
                description: "Traditional harmonic mixing approach",
                ruleSets: [classicHarmonic],
                globalWeights: { harmonic: 0.6, energy: 0.3, stylistic: 0.1 },
                createdBy: "system",
            }),
            createMixingPolicy({
                id: "modern_ai",
                name: "Modern AI Mixing",
                description: "Enrichment-aware mixing with stylistic rules",
                ruleSets: [classicHarmonic, aiStylistic],
                globalWeights: {
                    harmonic: 0.3,
                    stylistic: 0.4,
                    energy: 0.2,
                    quality: 0.1,
                },
                adaptiveWeights: true,
                createdBy: "system",
            }),
            createMixingPolicy({
                id: "cultural_journey",
                name: "Cultural Journey",
                description: "Cross-cultural mixing with intelligent transitions",
                ruleSets: [culturalJourney],
                globalWeights: {
                    linguistic: 0.4,
                    temporal: 0.3,
                    harmonic: 0.2,
                    stylistic: 0.1,
                },
                createdBy: "system",
            }),
        ],
        ruleSets: [classicHarmonic, aiStylistic, culturalJourney],
    };
}
