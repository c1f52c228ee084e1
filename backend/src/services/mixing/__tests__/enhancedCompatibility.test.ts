import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type {
    StructuralAnalysis,
    Track,
    TransitionPoint,
} from "@mixflow/track-analysis-contract";
import { PolicyNotFoundError } from "../../../utils/errors";
import { PolicyManager } from "../../policies/policyManager";
import { EnhancedCompatibilityEngine } from "../enhancedCompatibility";
import { HarmonicMixingEngine } from "../harmonicEngine";

function buildTrack(overrides: Partial<Track> = {}): Track {
    return {
        id: "track-1",
        title: "Track",
        artist: "Artist",
        key: "8A",
        bpm: 125,
        energy: 5,
        ...overrides,
    };
}

function buildPoint(
    timeSeconds: number,
    elementType: TransitionPoint["elementType"],
    mixSuitability: number,
    energyLevel: number,
    beatStrength: number,
): TransitionPoint {
    return { timeSeconds, confidence: 0.9, elementType, energyLevel, beatStrength, mixSuitability };
}

function buildAnalysis(
    trackId: string,
    duration: number,
    transitionPoints: TransitionPoint[],
): StructuralAnalysis {
    return {
        trackId,
        duration,
        beatGrid: [],
        tempoChanges: [],
        energyCurve: [],
        transitionPoints,
    };
}

describe("EnhancedCompatibilityEngine", () => {
    let tempDir: string;
    let policyManager: PolicyManager;
    let engine: EnhancedCompatibilityEngine;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mixflow-enhanced-"));
        policyManager = new PolicyManager({ configDir: tempDir });
        engine = new EnhancedCompatibilityEngine({
            baseEngine: new HarmonicMixingEngine(),
            policyManager,
        });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("uses neutral scores for every missing dimension", () => {
        const score = engine.calculateEnhancedCompatibility(
            buildTrack({ id: "a" }),
            buildTrack({ id: "b" }),
        );

        expect(score).toBeCloseTo(0.25 * 0.9 + 0.75 * 0.5);
    });

    it("blends in stylistic compatibility when both tracks have metadata", () => {
        const score = engine.calculateEnhancedCompatibility(
            buildTrack({ id: "a" }),
            buildTrack({ id: "b" }),
            null,
            null,
            { subgenre: "salsa romantica", mood: "romantic" },
            { subgenre: "salsa dura", mood: "energetic" },
        );
        const stylistic = (0.7 * 0.25 + 0.5 * 0.2) / 0.45;

        expect(score).toBeCloseTo(0.25 * 0.9 + 0.25 * stylistic + 0.5 * 0.5);
    });

    it("blends the policy score of the incoming track", () => {
        const a = buildTrack({ id: "a" });
        const b = buildTrack({ id: "b" });

        const withoutPolicy = engine.calculatePolicyAwareCompatibility(a, b);
        const withPolicy = engine.calculatePolicyAwareCompatibility(a, b, {
            policyId: "classic_dj",
        });

        expect(withoutPolicy).toBeCloseTo(0.6);
        expect(withPolicy).toBeCloseTo(0.8 * 0.6);
    });

    it("throws for an unknown policy or a missing policy manager", () => {
        const a = buildTrack({ id: "a" });
        const b = buildTrack({ id: "b" });
        const unmanaged = new EnhancedCompatibilityEngine();

        expect(() =>
            engine.calculatePolicyAwareCompatibility(a, b, { policyId: "missing" }),
        ).toThrow(PolicyNotFoundError);
        expect(() =>
            unmanaged.calculatePolicyAwareCompatibility(a, b, { policyId: "classic_dj" }),
        ).toThrow(PolicyNotFoundError);
    });

    it("finds the optimal transition between two analysed tracks", () => {
        const a = buildTrack({ id: "a" });
        const b = buildTrack({ id: "b" });
        const outgoing = buildAnalysis("a", 240, [buildPoint(210, "outro", 0.9, 0.7, 0.8)]);
        const incoming = buildAnalysis("b", 200, [buildPoint(16, "intro", 0.85, 0.6, 0.9)]);

        const transition = engine.findOptimalTransition(a, b, outgoing, incoming);

        expect(transition).not.toBeNull();
        expect(transition?.trackFrom).toBe(a);
        expect(transition?.trackTo).toBe(b);
        expect(transition?.outPoint.timeSeconds).toBe(210);
        expect(transition?.inPoint.timeSeconds).toBe(16);
        expect(transition?.transitionQuality).toBeCloseTo(0.91);
        expect(transition?.estimatedMixDuration).toBe(12);
        expect(transition?.compatibilityScore).toBeCloseTo(
            engine.calculateEnhancedCompatibility(a, b, outgoing, incoming),
        );
    });

    it("returns no transition without transition points", () => {
        const transition = engine.findOptimalTransition(
            buildTrack({ id: "a" }),
            buildTrack({ id: "b" }),
            buildAnalysis("a", 240, []),
            buildAnalysis("b", 200, [buildPoint(16, "intro", 0.85, 0.6, 0.9)]),
        );

        expect(transition).toBeNull();
    });

    it("explains a harmonic-only pairing", () => {
        const explanation = engine.getCompatibilityExplanation(
            buildTrack({ id: "a" }),
            buildTrack({ id: "b", key: "9A", bpm: 126 }),
        );

        expect(explanation.overallScore).toBeCloseTo(0.25 * 0.82 + 0.375);
        expect(explanation.harmonic.score).toBeCloseTo(0.82);
        expect(explanation.harmonic.keyMatch).toBe("8A → 9A");
        expect(explanation.harmonic.bpmMatch).toBe("125 → 126 BPM");
        expect(explanation.harmonic.energyMatch).toBe("5 → 5");
        expect(explanation.stylistic).toBeUndefined();
        expect(explanation.recommendations).toEqual([]);
    });

    it("reports missing harmonic data", () => {
        const explanation = engine.getCompatibilityExplanation(
            buildTrack({ id: "a", key: null, bpm: 0, energy: null }),
            buildTrack({ id: "b" }),
        );

        expect(explanation.harmonic.keyMatch).toBe("No key data");
        expect(explanation.harmonic.bpmMatch).toBe("No BPM data");
        expect(explanation.harmonic.energyMatch).toBe("No energy data");
    });

    it("recommends bridges for stylistic clashes", () => {
        const explanation = engine.getCompatibilityExplanation(
            buildTrack({ id: "a" }),
            buildTrack({ id: "b" }),
            { mood: "chill", era: "70s" },
            { mood: "energetic", era: "2020s" },
        );

        expect(explanation.stylistic).toEqual({
            score: expect.closeTo(0.3, 5),
            subgenreMatch: "unknown → unknown",
            moodMatch: "chill → energetic",
            eraMatch: "70s → 2020s",
            languageMatch: "unknown → unknown",
            breakdown: { mood: 0.3, era: 0.3 },
        });
        expect(explanation.recommendations).toEqual([
            "Consider using a bridge track for smoother transition",
            "Mood mismatch - consider gradual energy transition",
            "Era mismatch - may create temporal disconnect",
        ]);
    });

    it("delegates style distance and bridge suggestions to the matrix", () => {
        const breakdown = engine.calculateStylisticCompatibilityDetailed(
            { mood: "romantic" },
            { mood: "energetic" },
        );
        const bridges = engine.findStyleBridgeTracks({ mood: "romantic" }, { mood: "energetic" }, [
            { track: buildTrack({ id: "bridge" }), metadata: { mood: "passionate" } },
        ]);

        expect(breakdown).toEqual({ mood: 0.5 });
        expect(bridges.map((bridge) => bridge.track.id)).toEqual(["bridge"]);
    });
});
