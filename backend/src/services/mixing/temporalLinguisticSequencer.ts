/**
 * Temporal and linguistic sequencing. Groups tracks by era or by language
 * from their enrichment metadata and orders them along a named flow
 * (chronological, nostalgic waves, bilingual segments, instrumental
 * bridges, ...). Era and language tables live in `data/temporalLinguistic.json`.
 */

import { z } from "zod";
import { normalizeStyleString } from "@mixflow/track-analysis-contract";
import type { Track, TrackMetadataMap } from "@mixflow/track-analysis-contract";
import rawTables from "../../data/temporalLinguistic.json";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("Mixing.TemporalLinguistic");

export const TEMPORAL_FLOW_VALUES = [
    "chronological",
    "reverse_chrono",
    "era_clustering",
    "nostalgic_waves",
    "golden_age",
    "cross_gen",
] as const;
export type TemporalFlow = (typeof TEMPORAL_FLOW_VALUES)[number];

export const LINGUISTIC_FLOW_VALUES = [
    "monolingual",
    "bilingual",
    "multilingual",
    "cultural_fusion",
    "instrumental",
    "language_waves",
] as const;
export type LinguisticFlow = (typeof LINGUISTIC_FLOW_VALUES)[number];

export const DEFAULT_SEQUENCE_LENGTH = 10;

const NEUTRAL_SCORE = 0.5;
const GOLDEN_AGE_WEIGHT = 0.9;
const FUSION_BRIDGE_THRESHOLD = 0.7;
const SEGMENT_SIZE = 2;
const MIN_TRACKS_PER_ERA = 2;
const MAX_LANGUAGE_WAVE = 3;
const INSTRUMENTAL_LANGUAGE = "Instrumental";

const eraDefinitionSchema = z.object({
    canonical: z.string().min(1),
    startYear: z.number().int(),
    endYear: z.number().int(),
    culturalWeight: z.number().min(0).max(1),
});

const languageDefinitionSchema = z.object({
    canonical: z.string().min(1),
    culturalContext: z.string().min(1),
    bridgePotential: z.number().min(0).max(1),
});

const transitionTableSchema = z.record(z.record(z.number().min(0).max(1)));

const tablesSchema = z.object({
    eras: z.record(eraDefinitionSchema),
    eraTransitions: transitionTableSchema,
    languages: z.record(languageDefinitionSchema),
    languageTransitions: transitionTableSchema,
});

export type EraDefinition = z.infer<typeof eraDefinitionSchema>;
export type LanguageDefinition = z.infer<typeof languageDefinitionSchema>;
export type TemporalLinguisticTables = z.infer<typeof tablesSchema>;

export function parseTemporalLinguisticTables(raw: unknown): TemporalLinguisticTables {
    const parsed = tablesSchema.safeParse(raw);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Era and language tables are malformed",
            { issues: parsed.error.errors },
        );
    }
    return parsed.data;
}

export interface TemporalCluster {
    era: string;
    tracks: Track[];
    startYear: number;
    endYear: number;
    culturalWeight: number;
    /** Mean transition score from this era to its listed neighbours. */
    transitionScore: number;
}

export interface LinguisticCluster {
    language: string;
    tracks: Track[];
    culturalContext: string;
    bridgePotential: number;
}

export interface TemporalLinguisticSequence {
    tracks: Track[];
    temporalFlow: TemporalFlow;
    linguisticFlow: LinguisticFlow;
    eraProgression: string[];
    languageProgression: string[];
    narrativeScore: number;
    culturalCoherence: number;
    transitionQuality: number;
}

/** A cluster's remaining tracks, consumed front first. */
interface Lane {
    label: string;
    queue: Track[];
}

interface Pick {
    track: Track;
    label: string;
}

function toLanes<T extends { tracks: Track[] }>(
    clusters: T[],
    labelOf: (cluster: T) => string,
): Lane[] {
    return clusters.map((cluster) => ({ label: labelOf(cluster), queue: [...cluster.tracks] }));
}

/** Up to `perLane` tracks from each lane in order, until `target` is reached. */
function takeBlocks(lanes: Lane[], perLane: number, target: number): Pick[] {
    const picks: Pick[] = [];
    for (const lane of lanes) {
        if (picks.length >= target) {
            break;
        }
        lane.queue
            .slice(0, perLane)
            .forEach((track) => picks.push({ track, label: lane.label }));
    }
    return picks.slice(0, target);
}

/**
 * Visits the lanes in turn, taking `turnSize(turn)` tracks per visit and
 * dropping lanes as they run dry.
 */
function interleave(lanes: Lane[], target: number, turnSize: (turn: number) => number): Pick[] {
    const active = lanes.filter((lane) => lane.queue.length > 0);
    const picks: Pick[] = [];
    let index = 0;

    for (let turn = 0; picks.length < target && active.length > 0; turn++) {
        index %= active.length;
        const lane = active[index];
        lane.queue
            .splice(0, Math.min(turnSize(turn), target - picks.length))
            .forEach((track) => picks.push({ track, label: lane.label }));

        if (lane.queue.length === 0) {
            active.splice(index, 1);
        } else {
            index += 1;
        }
    }

    return picks;
}

/** [0, n-1, 1, n-2, ...] */
function outsideIn<T>(items: T[]): T[] {
    const ordered: T[] = [];
    for (let low = 0, high = items.length - 1; low <= high; low++, high--) {
        ordered.push(items[low]);
        if (high !== low) {
            ordered.push(items[high]);
        }
    }
    return ordered;
}

/** a0, b0, a1, b1, ...; whichever list is longer finishes the sequence. */
function alternate(first: Pick[], second: Pick[]): Pick[] {
    const merged: Pick[] = [];
    for (let i = 0; i < Math.max(first.length, second.length); i++) {
        if (i < first.length) {
            merged.push(first[i]);
        }
        if (i < second.length) {
            merged.push(second[i]);
        }
    }
    return merged;
}

function firstLargest(clusters: LinguisticCluster[]): LinguisticCluster {
    return clusters.reduce((best, cluster) =>
        cluster.tracks.length > best.tracks.length ? cluster : best,
    );
}

function mean(values: number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class TemporalLinguisticSequencer {
    private readonly tables: TemporalLinguisticTables;

    constructor(tables: TemporalLinguisticTables = parseTemporalLinguisticTables(rawTables)) {
        this.tables = tables;
    }

    lookupEra(value: unknown): EraDefinition | undefined {
        const key = normalizeStyleString(value);
        return key ? this.tables.eras[key] : undefined;
    }

    lookupLanguage(value: unknown): LanguageDefinition | undefined {
        const key = normalizeStyleString(value);
        return key ? this.tables.languages[key] : undefined;
    }

    /** Canonical era name; unknown eras are kept as written. */
    normalizeEra(value: unknown): string | undefined {
        const key = normalizeStyleString(value);
        if (!key || typeof value !== "string") {
            return undefined;
        }
        return this.tables.eras[key]?.canonical ?? value.trim();
    }

    /** Canonical language name; unknown languages are kept as written. */
    normalizeLanguage(value: unknown): string | undefined {
        const key = normalizeStyleString(value);
        if (!key || typeof value !== "string") {
            return undefined;
        }
        return this.tables.languages[key]?.canonical ?? value.trim();
    }

    /** Mean of the era's outgoing transition scores; 0.5 for an unlisted era. */
    eraTransitionScore(era: string): number {
        const transitions = Object.values(this.tables.eraTransitions[era] ?? {});
        return transitions.length > 0 ? mean(transitions) : NEUTRAL_SCORE;
    }

    /** Tracks with a known era, grouped by canonical era and ordered by start year. */
    analyzeTemporalClusters(tracks: Track[], metadata: TrackMetadataMap = {}): TemporalCluster[] {
        const clusters = new Map<string, TemporalCluster>();

        for (const track of tracks) {
            const era = this.lookupEra(metadata[track.id]?.era);
            if (!era) {
                continue;
            }
            const cluster = clusters.get(era.canonical);
            if (cluster) {
                cluster.tracks.push(track);
            } else {
                clusters.set(era.canonical, {
                    era: era.canonical,
                    tracks: [track],
                    startYear: era.startYear,
                    endYear: era.endYear,
                    culturalWeight: era.culturalWeight,
                    transitionScore: this.eraTransitionScore(era.canonical),
                });
            }
        }

        return [...clusters.values()].sort((a, b) => a.startYear - b.startYear);
    }

    /** Tracks with a known language, grouped and ordered by bridge potential, highest first. */
    analyzeLinguisticClusters(
        tracks: Track[],
        metadata: TrackMetadataMap = {},
    ): LinguisticCluster[] {
        const clusters = new Map<string, LinguisticCluster>();

        for (const track of tracks) {
            const language = this.lookupLanguage(metadata[track.id]?.language);
            if (!language) {
                continue;
            }
            const cluster = clusters.get(language.canonical);
            if (cluster) {
                cluster.tracks.push(track);
            } else {
                clusters.set(language.canonical, {
                    language: language.canonical,
                    tracks: [track],
                    culturalContext: language.culturalContext,
                    bridgePotential: language.bridgePotential,
                });
            }
        }

        return [...clusters.values()].sort((a, b) => b.bridgePotential - a.bridgePotential);
    }

    /**
     * Orders tracks by era. Without any known era the pool is returned in
     * input order with neutral scores.
     */
    createTemporalSequence(
        tracks: Track[],
        metadata: TrackMetadataMap = {},
        temporalFlow: TemporalFlow = "chronological",
        targetLength: number = DEFAULT_SEQUENCE_LENGTH,
    ): TemporalLinguisticSequence {
        const clusters = this.analyzeTemporalClusters(tracks, metadata);
        if (clusters.length === 0) {
            log.debug("No known eras in pool; keeping input order");
            return this.unsequenced(tracks, targetLength, temporalFlow, "monolingual");
        }

        const picks = this.orderByEra(clusters, temporalFlow, targetLength);
        return this.scored(
            {
                tracks: picks.map((pick) => pick.track),
                temporalFlow,
                linguisticFlow: "monolingual",
                eraProgression: picks.map((pick) => pick.label),
                languageProgression: [],
            },
            metadata,
        );
    }

    /**
     * Orders tracks by language. Without any known language the pool is
     * returned in input order with neutral scores.
     */
    createLinguisticSequence(
        tracks: Track[],
        metadata: TrackMetadataMap = {},
        linguisticFlow: LinguisticFlow = "bilingual",
        targetLength: number = DEFAULT_SEQUENCE_LENGTH,
    ): TemporalLinguisticSequence {
        const clusters = this.analyzeLinguisticClusters(tracks, metadata);
        if (clusters.length === 0) {
            log.debug("No known languages in pool; keeping input order");
            return this.unsequenced(tracks, targetLength, "chronological", linguisticFlow);
        }

        const picks = this.orderByLanguage(clusters, linguisticFlow, targetLength);
        return this.scored(
            {
                tracks: picks.map((pick) => pick.track),
                temporalFlow: "chronological",
                linguisticFlow,
                eraProgression: [],
                languageProgression: picks.map((pick) => pick.label),
            },
            metadata,
        );
    }

    /**
     * Ranks tracks carrying both a known era and a known language by
     * `(culturalWeight * eraTransitionScore + bridgePotential) / 2`. Without
     * such tracks the pool is returned in input order with neutral scores.
     */
    createCombinedSequence(
        tracks: Track[],
        metadata: TrackMetadataMap = {},
        temporalFlow: TemporalFlow = "chronological",
        linguisticFlow: LinguisticFlow = "bilingual",
        targetLength: number = DEFAULT_SEQUENCE_LENGTH,
    ): TemporalLinguisticSequence {
        const temporalClusters = this.analyzeTemporalClusters(tracks, metadata);
        const linguisticClusters = this.analyzeLinguisticClusters(tracks, metadata);

        const ranked: Array<{ track: Track; score: number }> = [];
        for (const temporal of temporalClusters) {
            for (const linguistic of linguisticClusters) {
                const score =
                    (temporal.culturalWeight * temporal.transitionScore +
                        linguistic.bridgePotential) /
                    2;
                temporal.tracks
                    .filter((track) => linguistic.tracks.includes(track))
                    .forEach((track) => ranked.push({ track, score }));
            }
        }

        if (ranked.length === 0) {
            log.debug("No track carries both a known era and language; keeping input order");
            return this.unsequenced(tracks, targetLength, temporalFlow, linguisticFlow);
        }

        const selected = ranked
            .sort((a, b) => b.score - a.score)
            .slice(0, Math.max(0, targetLength))
            .map((entry) => entry.track);

        return this.scored(
            {
                tracks: selected,
                temporalFlow,
                linguisticFlow,
                eraProgression: selected.flatMap(
                    (track) => this.normalizeEra(metadata[track.id]?.era) ?? [],
                ),
                languageProgression: selected.flatMap(
                    (track) => this.normalizeLanguage(metadata[track.id]?.language) ?? [],
                ),
            },
            metadata,
        );
    }

    /** Mean era transition score over neighbours that both carry an era; unlisted pairs score 0.5. */
    calculateNarrativeScore(tracks: Track[], metadata: TrackMetadataMap = {}): number {
        const scores: number[] = [];
        for (let i = 0; i + 1 < tracks.length; i++) {
            const current = this.normalizeEra(metadata[tracks[i].id]?.era);
            const next = this.normalizeEra(metadata[tracks[i + 1].id]?.era);
            if (current && next) {
                scores.push(this.tables.eraTransitions[current]?.[next] ?? NEUTRAL_SCORE);
            }
        }
        return scores.length > 0 ? mean(scores) : NEUTRAL_SCORE;
    }

    /** 1.0 for one language, 0.8 for two or three, 0.6 beyond; 0.5 without languages. */
    calculateCulturalCoherence(tracks: Track[], metadata: TrackMetadataMap = {}): number {
        const languages = new Set(
            tracks.flatMap((track) => this.normalizeLanguage(metadata[track.id]?.language) ?? []),
        );
        if (languages.size === 0) {
            return NEUTRAL_SCORE;
        }
        if (languages.size === 1) {
            return 1.0;
        }
        return languages.size <= 3 ? 0.8 : 0.6;
    }

    /** Mean language transition score over neighbours that both carry a language. */
    calculateTransitionQuality(tracks: Track[], metadata: TrackMetadataMap = {}): number {
        const scores: number[] = [];
        for (let i = 0; i + 1 < tracks.length; i++) {
            const current = this.normalizeLanguage(metadata[tracks[i].id]?.language);
            const next = this.normalizeLanguage(metadata[tracks[i + 1].id]?.language);
            if (current && next) {
                scores.push(this.tables.languageTransitions[current]?.[next] ?? NEUTRAL_SCORE);
            }
        }
        return scores.length > 0 ? mean(scores) : NEUTRAL_SCORE;
    }

    private orderByEra(clusters: TemporalCluster[], flow: TemporalFlow, target: number): Pick[] {
        const byEra = (cluster: TemporalCluster) => cluster.era;
        const evenShare = (minimum: number, count: number) =>
            Math.max(minimum, Math.floor(target / count));

        switch (flow) {
            case "chronological":
                return takeBlocks(toLanes(clusters, byEra), evenShare(1, clusters.length), target);
            case "reverse_chrono":
                return takeBlocks(
                    toLanes([...clusters].reverse(), byEra),
                    evenShare(1, clusters.length),
                    target,
                );
            case "era_clustering":
                return this.orderByWeight(clusters, target);
            case "nostalgic_waves":
                return interleave(toLanes(clusters, byEra), target, () => SEGMENT_SIZE);
            case "golden_age": {
                const golden = clusters.filter(
                    (cluster) => cluster.culturalWeight >= GOLDEN_AGE_WEIGHT,
                );
                return this.orderByWeight(
                    golden.length > 0
                        ? golden
                        : [
                              clusters.reduce((best, cluster) =>
                                  cluster.culturalWeight > best.culturalWeight ? cluster : best,
                              ),
                          ],
                    target,
                );
            }
            case "cross_gen":
                return interleave(toLanes(outsideIn(clusters), byEra), target, () => 1);
        }
    }

    /** Heaviest eras first, at least two tracks from each. */
    private orderByWeight(clusters: TemporalCluster[], target: number): Pick[] {
        const sorted = [...clusters].sort((a, b) => b.culturalWeight - a.culturalWeight);
        return takeBlocks(
            toLanes(sorted, (cluster) => cluster.era),
            Math.max(MIN_TRACKS_PER_ERA, Math.floor(target / clusters.length)),
            target,
        );
    }

    private orderByLanguage(
        clusters: LinguisticCluster[],
        flow: LinguisticFlow,
        target: number,
    ): Pick[] {
        const byLanguage = (cluster: LinguisticCluster) => cluster.language;
        const monolingual = () =>
            takeBlocks(toLanes([firstLargest(clusters)], byLanguage), target, target);

        switch (flow) {
            case "monolingual":
                return monolingual();
            case "bilingual": {
                if (clusters.length < 2) {
                    return monolingual();
                }
                const mainLanguages = [...clusters]
                    .sort((a, b) => b.tracks.length - a.tracks.length)
                    .slice(0, 2);
                return interleave(toLanes(mainLanguages, byLanguage), target, () => SEGMENT_SIZE);
            }
            case "multilingual":
                return interleave(toLanes(clusters, byLanguage), target, () => 1);
            case "cultural_fusion": {
                const bridging = clusters.filter(
                    (cluster) => cluster.bridgePotential > FUSION_BRIDGE_THRESHOLD,
                );
                return interleave(
                    toLanes(bridging.length > 0 ? bridging : clusters, byLanguage),
                    target,
                    () => 1,
                );
            }
            case "instrumental": {
                const instrumental = clusters.filter(
                    (cluster) => cluster.language === INSTRUMENTAL_LANGUAGE,
                );
                const vocal = clusters.filter(
                    (cluster) => cluster.language !== INSTRUMENTAL_LANGUAGE,
                );
                if (instrumental.length === 0 || vocal.length === 0) {
                    return interleave(toLanes(clusters, byLanguage), target, () => 1);
                }
                const vocalPicks = interleave(toLanes(vocal, byLanguage), target, () => 1);
                const bridgePicks = takeBlocks(toLanes(instrumental, byLanguage), target, target);
                return alternate(vocalPicks, bridgePicks).slice(0, target);
            }
            case "language_waves": {
                if (clusters.length < 2) {
                    return monolingual();
                }
                const bySize = [...clusters].sort((a, b) => b.tracks.length - a.tracks.length);
                return interleave(toLanes(bySize, byLanguage), target, (turn) =>
                    Math.min(MAX_LANGUAGE_WAVE, turn + 1),
                );
            }
        }
    }

    private unsequenced(
        tracks: Track[],
        targetLength: number,
        temporalFlow: TemporalFlow,
        linguisticFlow: LinguisticFlow,
    ): TemporalLinguisticSequence {
        return {
            tracks: tracks.slice(0, Math.max(0, targetLength)),
            temporalFlow,
            linguisticFlow,
            eraProgression: [],
            languageProgression: [],
            narrativeScore: NEUTRAL_SCORE,
            culturalCoherence: NEUTRAL_SCORE,
            transitionQuality: NEUTRAL_SCORE,
        };
    }

    private scored(
        sequence: Omit<
            TemporalLinguisticSequence,
            "narrativeScore" | "culturalCoherence" | "transitionQuality"
        >,
        metadata: TrackMetadataMap,
    ): TemporalLinguisticSequence {
        return {
            ...sequence,
            narrativeScore: this.calculateNarrativeScore(sequence.tracks, metadata),
            culturalCoherence: this.calculateCulturalCoherence(sequence.tracks, metadata),
            transitionQuality: this.calculateTransitionQuality(sequence.tracks, metadata),
        };
    }
}

export const temporalLinguisticSequencer = new TemporalLinguisticSequencer();
