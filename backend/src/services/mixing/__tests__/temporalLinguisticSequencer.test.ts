import type { Track, TrackMetadataMap } from "@mixflow/track-analysis-contract";
import { AppError } from "../../../utils/errors";
import {
    TemporalLinguisticSequencer,
    parseTemporalLinguisticTables,
} from "../temporalLinguisticSequencer";

function buildTrack(id: string): Track {
    return { id, title: `Title ${id}`, artist: "Artist" };
}

function ids(tracks: Track[]) {
    return tracks.map((track) => track.id);
}

const pool = ["t1", "t2", "t3", "t4", "t5", "t6"].map(buildTrack);

const metadata: TrackMetadataMap = {
    t1: { era: "90s", language: "Spanish" },
    t2: { era: "1980s", language: "English" },
    t3: { era: "nineties", language: "spanish" },
    t4: { era: "2000s", language: "Instrumental" },
    t5: { era: "80s", language: "English" },
    t6: { era: "Roaring Twenties", language: "Klingon" },
};

describe("TemporalLinguisticSequencer", () => {
    const sequencer = new TemporalLinguisticSequencer();

    describe("tables", () => {
        it("rejects malformed era definitions", () => {
            expect(() =>
                parseTemporalLinguisticTables({ eras: { x: { canonical: "X" } } }),
            ).toThrow(AppError);
        });

        it("normalizes eras and languages to their canonical names", () => {
            expect(sequencer.normalizeEra(" 80s ")).toBe("1980s");
            expect(sequencer.normalizeEra("Roaring Twenties")).toBe("Roaring Twenties");
            expect(sequencer.normalizeEra("-")).toBeUndefined();
            expect(sequencer.normalizeLanguage("PORTUGUESE")).toBe("Portuguese");
            expect(sequencer.normalizeLanguage(42)).toBeUndefined();
        });
    });

    describe("clusters", () => {
        it("groups known eras by start year", () => {
            const clusters = sequencer.analyzeTemporalClusters(pool, metadata);

            expect(clusters.map((cluster) => cluster.era)).toEqual(["1980s", "1990s", "2000s"]);
            expect(clusters.map((cluster) => ids(cluster.tracks))).toEqual([
                ["t2", "t5"],
                ["t1", "t3"],
                ["t4"],
            ]);
            expect(clusters[0].transitionScore).toBeCloseTo(0.84);
            expect(clusters[1].transitionScore).toBeCloseTo(0.825);
            expect(clusters[2].culturalWeight).toBe(0.8);
        });

        it("groups known languages by bridge potential", () => {
            const clusters = sequencer.analyzeLinguisticClusters(pool, metadata);

            expect(clusters.map((cluster) => cluster.language)).toEqual([
                "Instrumental",
                "Spanish",
                "English",
            ]);
            expect(clusters[1].tracks.map((track) => track.id)).toEqual(["t1", "t3"]);
            expect(clusters[2].culturalContext).toBe("Anglo-American");
        });
    });

    describe("createTemporalSequence", () => {
        it("walks the eras in order and scores the result", () => {
            const sequence = sequencer.createTemporalSequence(pool, metadata);

            expect(ids(sequence.tracks)).toEqual(["t2", "t5", "t1", "t3", "t4"]);
            expect(sequence.eraProgression).toEqual([
                "1980s",
                "1980s",
                "1990s",
                "1990s",
                "2000s",
            ]);
            expect(sequence.temporalFlow).toBe("chronological");
            expect(sequence.linguisticFlow).toBe("monolingual");
            expect(sequence.languageProgression).toEqual([]);
            expect(sequence.narrativeScore).toBeCloseTo(0.7);
            expect(sequence.culturalCoherence).toBe(0.8);
            expect(sequence.transitionQuality).toBeCloseTo(0.825);
        });

        it("shares a short target evenly across eras", () => {
            const sequence = sequencer.createTemporalSequence(pool, metadata, "chronological", 3);

            expect(ids(sequence.tracks)).toEqual(["t2", "t1", "t4"]);
        });

        it("reverses the era order", () => {
            expect(
                ids(sequencer.createTemporalSequence(pool, metadata, "reverse_chrono").tracks),
            ).toEqual(["t4", "t1", "t3", "t2", "t5"]);
        });

        it("clusters the heaviest eras first", () => {
            expect(
                ids(sequencer.createTemporalSequence(pool, metadata, "era_clustering", 4).tracks),
            ).toEqual(["t2", "t5", "t1", "t3"]);
        });

        it("keeps to golden-age eras, or the heaviest one", () => {
            const modern = ["x1", "x2"].map(buildTrack);

            expect(
                ids(sequencer.createTemporalSequence(pool, metadata, "golden_age").tracks),
            ).toEqual(["t2", "t5", "t1", "t3"]);
            expect(
                ids(
                    sequencer.createTemporalSequence(
                        modern,
                        { x1: { era: "2000s" }, x2: { era: "2020s" } },
                        "golden_age",
                    ).tracks,
                ),
            ).toEqual(["x1"]);
        });

        it("moves between eras in waves of two", () => {
            const waves = ["e1", "e2", "e3", "n1", "n2", "n3"].map(buildTrack);
            const waveMetadata: TrackMetadataMap = {
                e1: { era: "80s" },
                e2: { era: "80s" },
                e3: { era: "80s" },
                n1: { era: "90s" },
                n2: { era: "90s" },
                n3: { era: "90s" },
            };

            expect(
                ids(
                    sequencer.createTemporalSequence(waves, waveMetadata, "nostalgic_waves")
                        .tracks,
                ),
            ).toEqual(["e1", "e2", "n1", "n2", "e3", "n3"]);
        });

        it("alternates the oldest and newest eras", () => {
            expect(
                ids(sequencer.createTemporalSequence(pool, metadata, "cross_gen").tracks),
            ).toEqual(["t2", "t4", "t1", "t5", "t3"]);
        });

        it("keeps input order when no era is known", () => {
            const sequence = sequencer.createTemporalSequence(pool, {}, "cross_gen", 2);

            expect(ids(sequence.tracks)).toEqual(["t1", "t2"]);
            expect(sequence.temporalFlow).toBe("cross_gen");
            expect(sequence.narrativeScore).toBe(0.5);
            expect(sequence.culturalCoherence).toBe(0.5);
            expect(sequence.transitionQuality).toBe(0.5);
        });

        it("leaves the pool untouched", () => {
            sequencer.createTemporalSequence(pool, metadata, "nostalgic_waves");

            expect(ids(pool)).toEqual(["t1", "t2", "t3", "t4", "t5", "t6"]);
            expect(
                sequencer.analyzeTemporalClusters(pool, metadata).map((c) => c.tracks.length),
            ).toEqual([2, 2, 1]);
        });
    });

    describe("createLinguisticSequence", () => {
        const mixed = ["f1", "f2", "f3", "f4"].map(buildTrack);
        const mixedMetadata: TrackMetadataMap = {
            f1: { language: "French" },
            f2: { language: "Portuguese" },
            f3: { language: "Spanish" },
            f4: { language: "English" },
        };

        it("keeps to the first largest language", () => {
            const sequence = sequencer.createLinguisticSequence(pool, metadata, "monolingual");

            expect(ids(sequence.tracks)).toEqual(["t1", "t3"]);
            expect(sequence.languageProgression).toEqual(["Spanish", "Spanish"]);
            expect(sequence.temporalFlow).toBe("chronological");
            expect(sequence.culturalCoherence).toBe(1.0);
            expect(sequence.transitionQuality).toBe(1.0);
            expect(sequence.narrativeScore).toBe(0.5);
        });

        it("pairs the two main languages in segments", () => {
            const sequence = sequencer.createLinguisticSequence(pool, metadata);

            expect(sequence.linguisticFlow).toBe("bilingual");
            expect(ids(sequence.tracks)).toEqual(["t1", "t3", "t2", "t5"]);
            expect(sequence.culturalCoherence).toBe(0.8);
            expect(sequence.transitionQuality).toBeCloseTo(0.8);
        });

        it("rotates through every language", () => {
            const sequence = sequencer.createLinguisticSequence(pool, metadata, "multilingual");

            expect(ids(sequence.tracks)).toEqual(["t4", "t1", "t2", "t3", "t5"]);
            expect(sequence.languageProgression).toEqual([
                "Instrumental",
                "Spanish",
                "English",
                "Spanish",
                "English",
            ]);
            expect(sequence.transitionQuality).toBeCloseTo(0.525);
        });

        it("fuses only languages that bridge well", () => {
            const fallback = ["g1", "g2"].map(buildTrack);

            expect(
                ids(
                    sequencer.createLinguisticSequence(mixed, mixedMetadata, "cultural_fusion")
                        .tracks,
                ),
            ).toEqual(["f3", "f4"]);
            expect(
                ids(
                    sequencer.createLinguisticSequence(
                        fallback,
                        { g1: { language: "French" }, g2: { language: "Italian" } },
                        "cultural_fusion",
                    ).tracks,
                ),
            ).toEqual(["g1", "g2"]);
        });

        it("bridges vocal tracks with instrumentals", () => {
            expect(
                ids(sequencer.createLinguisticSequence(pool, metadata, "instrumental").tracks),
            ).toEqual(["t1", "t4", "t2", "t3", "t5"]);
            expect(
                ids(
                    sequencer.createLinguisticSequence(mixed, mixedMetadata, "instrumental")
                        .tracks,
                ),
            ).toEqual(["f3", "f4", "f2", "f1"]);
        });

        it("grows language waves up to three tracks", () => {
            const waves = ["s1", "s2", "s3", "s4", "e1", "e2", "e3"].map(buildTrack);
            const waveMetadata: TrackMetadataMap = {
                s1: { language: "Spanish" },
                s2: { language: "Spanish" },
                s3: { language: "Spanish" },
                s4: { language: "Spanish" },
                e1: { language: "English" },
                e2: { language: "English" },
                e3: { language: "English" },
            };

            expect(
                ids(
                    sequencer.createLinguisticSequence(waves, waveMetadata, "language_waves")
                        .tracks,
                ),
            ).toEqual(["s1", "e1", "e2", "s2", "s3", "s4", "e3"]);
            expect(
                ids(
                    sequencer.createLinguisticSequence(waves, waveMetadata, "language_waves", 5)
                        .tracks,
                ),
            ).toEqual(["s1", "e1", "e2", "s2", "s3"]);
        });

        it("scores four or more languages as least coherent", () => {
            expect(sequencer.calculateCulturalCoherence(mixed, mixedMetadata)).toBe(0.6);
        });
    });

    describe("createCombinedSequence", () => {
        it("ranks tracks by era weight and language bridge potential", () => {
            const sequence = sequencer.createCombinedSequence(
                pool,
                metadata,
                undefined,
                undefined,
                3,
            );

            expect(ids(sequence.tracks)).toEqual(["t4", "t1", "t3"]);
            expect(sequence.eraProgression).toEqual(["2000s", "1990s", "1990s"]);
            expect(sequence.languageProgression).toEqual(["Instrumental", "Spanish", "Spanish"]);
            expect(sequence.temporalFlow).toBe("chronological");
            expect(sequence.linguisticFlow).toBe("bilingual");
            expect(sequence.narrativeScore).toBeCloseTo(0.7);
            expect(sequence.culturalCoherence).toBe(0.8);
            expect(sequence.transitionQuality).toBeCloseTo(0.95);
        });

        it("skips tracks missing an era or a language", () => {
            expect(ids(sequencer.createCombinedSequence(pool, metadata).tracks)).toEqual([
                "t4",
                "t1",
                "t3",
                "t2",
                "t5",
            ]);
        });

        it("keeps input order when no track carries both", () => {
            const sequence = sequencer.createCombinedSequence(
                pool,
                { t1: { era: "80s" }, t2: { language: "English" } },
                "golden_age",
                "instrumental",
            );

            expect(ids(sequence.tracks)).toEqual(["t1", "t2", "t3", "t4", "t5", "t6"]);
            expect(sequence.temporalFlow).toBe("golden_age");
            expect(sequence.linguisticFlow).toBe("instrumental");
            expect(sequence.eraProgression).toEqual([]);
        });
    });
});
