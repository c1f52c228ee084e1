import type { Track } from "@mixflow/track-analysis-contract";
import { AppError } from "../../../utils/errors";
import {
    EnhancedPairScorer,
    HarmonicMixingEngine,
    MIX_MODE_WEIGHTS,
    calculateBpmScore,
    calculateEmotionalScore,
    calculateEnergyScore,
    calculateKeyScore,
    getCompatibleKeys,
    isMixMode,
} from "../harmonicEngine";

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

describe("key scoring", () => {
    it("lists the key, both wheel neighbours and the relative key", () => {
        expect(getCompatibleKeys("8A")).toEqual(["8A", "7A", "9A", "8B"]);
        expect(getCompatibleKeys("12b")).toEqual(["12B", "11B", "1B", "12A"]);
        expect(getCompatibleKeys("1A")).toEqual(["1A", "12A", "2A", "1B"]);
    });

    it("returns no compatible keys for malformed input", () => {
        expect(getCompatibleKeys("H3")).toEqual([]);
        expect(getCompatibleKeys(null)).toEqual([]);
    });

    it("scores identical, adjacent and relative keys", () => {
        expect(calculateKeyScore("8A", "8a")).toBe(1.0);
        expect(calculateKeyScore("8A", "9A")).toBe(0.8);
        expect(calculateKeyScore("8A", "8B")).toBe(0.8);
        expect(calculateKeyScore("12A", "1A")).toBe(0.8);
    });

    it("decays with wheel distance and bottoms out at zero", () => {
        expect(calculateKeyScore("8A", "10A")).toBeCloseTo(0.3);
        expect(calculateKeyScore("8A", "9B")).toBeCloseTo(0.4);
        expect(calculateKeyScore("8A", "2A")).toBe(0);
    });

    it("scores malformed keys as zero", () => {
        expect(calculateKeyScore("8A", "not-a-key")).toBe(0);
    });
});

describe("numeric dimension scoring", () => {
    it("keeps tempo fully compatible within 2 BPM", () => {
        expect(calculateBpmScore(125, 127)).toBe(1.0);
        expect(calculateBpmScore(125, 129)).toBeCloseTo(2 / 3);
        expect(calculateBpmScore(125, 131)).toBeCloseTo(0.5);
    });

    it("never increases the tempo score as the difference grows", () => {
        let previous = Number.POSITIVE_INFINITY;
        for (let diff = 0; diff <= 6; diff += 0.5) {
            const score = calculateBpmScore(120, 120 + diff);
            expect(score).toBeLessThanOrEqual(previous);
            previous = score;
        }
    });

    it("recognizes half and double time", () => {
        expect(calculateBpmScore(64, 128)).toBe(0.6);
        expect(calculateBpmScore(140, 72)).toBe(0.6);
    });

    it("decays distant tempos towards zero", () => {
        expect(calculateBpmScore(100, 120)).toBeCloseTo(0.02);
        expect(calculateBpmScore(100, 160)).toBe(0);
    });

    it("scores energy steps", () => {
        expect(calculateEnergyScore(5, 6)).toBe(1.0);
        expect(calculateEnergyScore(5, 7)).toBe(0.8);
        expect(calculateEnergyScore(5, 9)).toBeCloseTo(0.3);
        expect(calculateEnergyScore(1, 9)).toBe(0);
    });

    it("scores emotional intensity linearly over a 0-10 scale", () => {
        expect(calculateEmotionalScore(3, 8)).toBeCloseTo(0.5);
        expect(calculateEmotionalScore(0, 10)).toBe(0);
    });
});

describe("HarmonicMixingEngine", () => {
    it("starts in intelligent mode", () => {
        const engine = new HarmonicMixingEngine();

        expect(engine.getMode()).toBe("intelligent");
        expect(engine.getWeights()).toEqual(MIX_MODE_WEIGHTS.intelligent);
    });

    it("scores a same-key pair without emotional data at 0.9", () => {
        const engine = new HarmonicMixingEngine();

        const score = engine.calculateCompatibility(
            buildTrack({ id: "a" }),
            buildTrack({ id: "b" }),
        );

        expect(score).toBeCloseTo(0.9);
    });

    it("treats zero and null numerics as absent without renormalizing", () => {
        const engine = new HarmonicMixingEngine();

        const score = engine.calculateCompatibility(
            buildTrack({ id: "a", bpm: 0, energy: null }),
            buildTrack({ id: "b" }),
        );

        expect(score).toBeCloseTo(0.4);
    });

    it("switches weights with the mode", () => {
        const engine = new HarmonicMixingEngine({ mode: "classic" });

        const score = engine.calculateCompatibility(
            buildTrack({ id: "a", key: "8A", bpm: 125 }),
            buildTrack({ id: "b", key: "9A", bpm: 125 }),
        );

        expect(engine.getMode()).toBe("classic");
        expect(score).toBeCloseTo(0.9 * 0.8 + 0.1);
    });

    it("rejects negative or non-finite weights", () => {
        const engine = new HarmonicMixingEngine();

        expect(() =>
            engine.setWeights({ key: -1, bpm: 0.3, energy: 0.2, emotional: Number.NaN }),
        ).toThrow(AppError);
        expect(engine.getWeights()).toEqual(MIX_MODE_WEIGHTS.intelligent);
    });

    it("validates mix mode names", () => {
        expect(isMixMode("energy")).toBe(true);
        expect(isMixMode("chaotic")).toBe(false);
    });

    it("builds a compatibility matrix with a zero diagonal", () => {
        const engine = new HarmonicMixingEngine();
        const tracks = [buildTrack({ id: "a" }), buildTrack({ id: "b", key: "2A" })];

        const matrix = engine.buildCompatibilityMatrix(tracks);

        expect(matrix[0][0]).toBe(0);
        expect(matrix[1][1]).toBe(0);
        expect(matrix[0][1]).toBeCloseTo(0.5);
        expect(matrix[1][0]).toBeCloseTo(0.5);
    });

    describe("generatePlaylist", () => {
        it("returns an empty playlist for an empty pool", () => {
            expect(new HarmonicMixingEngine().generatePlaylist([])).toEqual([]);
        });

        it("returns an empty playlist when the start track is not in the pool", () => {
            const engine = new HarmonicMixingEngine();

            const playlist = engine.generatePlaylist(
                [buildTrack({ id: "a" })],
                buildTrack({ id: "outsider" }),
            );

            expect(playlist).toEqual([]);
        });

        it("stops once no candidate clears the minimum score", () => {
            const engine = new HarmonicMixingEngine();
            const tracks = [
                buildTrack({ id: "a" }),
                buildTrack({ id: "b", bpm: 126 }),
                buildTrack({ id: "c", key: "2A", bpm: 90, energy: 1 }),
            ];

            const playlist = engine.generatePlaylist(tracks, null, 10);

            expect(playlist.map((track) => track.id)).toEqual(["a", "b"]);
        });

        it("prefers rising energy on an ascending curve", () => {
            const engine = new HarmonicMixingEngine();
            const tracks = [
                buildTrack({ id: "a", energy: 5 }),
                buildTrack({ id: "down", energy: 4 }),
                buildTrack({ id: "up", energy: 6 }),
            ];

            const playlist = engine.generatePlaylist(tracks, tracks[0], 3, "ascending");

            expect(playlist.map((track) => track.id)).toEqual(["a", "up", "down"]);
        });

        it("never exceeds the target length or repeats a track", () => {
            const engine = new HarmonicMixingEngine();
            const tracks = ["a", "b", "c", "d", "e"].map((id) => buildTrack({ id }));

            const playlist = engine.generatePlaylist(tracks, null, 3);

            expect(playlist).toHaveLength(3);
            expect(new Set(playlist.map((track) => track.id)).size).toBe(3);
        });
    });

    describe("calculateEnhancedCompatibility", () => {
        it("falls back to the base score without an enhanced scorer", () => {
            const engine = new HarmonicMixingEngine();
            const a = buildTrack({ id: "a" });
            const b = buildTrack({ id: "b" });

            expect(engine.supportsEnhancedScoring()).toBe(false);
            expect(engine.calculateEnhancedCompatibility(a, b)).toBeCloseTo(0.9);
        });

        it("delegates structural and metadata pairs to the injected scorer", () => {
            const scorer: EnhancedPairScorer = {
                calculateEnhancedCompatibility: jest.fn().mockReturnValue(0.42),
            };
            const engine = new HarmonicMixingEngine({ enhancedScorer: scorer });
            const a = buildTrack({ id: "a" });
            const b = buildTrack({ id: "b" });
            const metadataA = { subgenre: "deep house" };

            const score = engine.calculateEnhancedCompatibility(a, b, undefined, {
                track1: metadataA,
                track2: null,
            });

            expect(score).toBe(0.42);
            expect(engine.supportsEnhancedScoring()).toBe(true);
            expect(scorer.calculateEnhancedCompatibility).toHaveBeenCalledWith(
                a,
                b,
                undefined,
                undefined,
                metadataA,
                null,
            );
        });
    });
});
