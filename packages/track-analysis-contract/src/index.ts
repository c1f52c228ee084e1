/**
 * Catalog track as handed to the scoring core. Numeric fields use `0`,
 * `null` or `undefined` for "not analysed".
 */
export interface Track {
    id: string;
    title: string;
    artist: string;
    filePath?: string;
    key?: string | null;
    bpm?: number | null;
    energy?: number | null;
    emotionalIntensity?: number | null;
    genre?: string | null;
    duration?: number | null;
    isAvailable?: boolean;
}

export const STRUCTURAL_ELEMENT_VALUES = [
    "intro",
    "verse",
    "chorus",
    "bridge",
    "outro",
    "break",
    "buildup",
    "drop",
] as const;

export type StructuralElement = (typeof STRUCTURAL_ELEMENT_VALUES)[number];

export interface TransitionPoint {
    timeSeconds: number;
    confidence: number;
    elementType: StructuralElement;
    energyLevel: number;
    beatStrength: number;
    mixSuitability: number;
}

/** `[seconds, bpm]` */
export type TempoChange = [number, number];
/** `[seconds, energy 0-1]` */
export type EnergySample = [number, number];

export interface StructuralAnalysis {
    trackId: string;
    duration: number;
    introEnd?: number | null;
    outroStart?: number | null;
    beatGrid: number[];
    tempoChanges: TempoChange[];
    energyCurve: EnergySample[];
    /** Ranked by mixSuitability, best first. */
    transitionPoints: TransitionPoint[];
}

export type MetadataField =
    | "subgenre"
    | "mood"
    | "era"
    | "language"
    | "danceability"
    | "crowd_appeal"
    | "mix_friendly"
    | "time_of_day"
    | "activity"
    | "season";

/** Raw enrichment output for one track; values are loosely typed strings or numbers. */
export type TrackMetadata = Partial<Record<MetadataField, unknown>> &
    Record<string, unknown>;

export type TrackMetadataMap = Record<string, TrackMetadata | undefined>;

export const isStructuralElement = (
    value: unknown,
): value is StructuralElement =>
    typeof value === "string" &&
    STRUCTURAL_ELEMENT_VALUES.some((element) => element === value);

/**
 * Presence check shared by the numeric scorers: analysers report missing
 * values as 0, so 0 counts as absent.
 */
export const isPresentNumber = (value: unknown): value is number =>
    typeof value === "number" && Number.isFinite(value) && value !== 0;

/** Lower-cased, trimmed style value; `"-"` and blanks are absent. */
export const normalizeStyleString = (value: unknown): string | undefined => {
    if (typeof value !== "string") {
        return undefined;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized.length === 0 || normalized === "-") {
        return undefined;
    }
    return normalized;
};

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Normalizes 0-1 fractions, 0-100 numbers and `"85%"` strings to 0-1,
 * clamping anything outside that range. Falsy values and `"-"` are absent.
 */
export const normalizePercentage = (value: unknown): number | undefined => {
    if (!value || value === "-") {
        return undefined;
    }

    if (typeof value === "string") {
        const trimmed = value.trim();
        if (trimmed.endsWith("%")) {
            const parsed = Number.parseFloat(trimmed.slice(0, -1));
            return Number.isFinite(parsed) ? clampUnit(parsed / 100) : undefined;
        }
        const parsed = Number.parseFloat(trimmed);
        if (!Number.isFinite(parsed)) {
            return undefined;
        }
        return clampUnit(parsed > 1 ? parsed / 100 : parsed);
    }

    if (typeof value === "number" && Number.isFinite(value)) {
        return clampUnit(value > 1 ? value / 100 : value);
    }

    return undefined;
};

export type CamelotLetter = "A" | "B";

export interface CamelotKey {
    number: number;
    letter: CamelotLetter;
}

const CAMELOT_PATTERN = /^(1[0-2]|[1-9])([AB])$/;

export const parseCamelotKey = (
    value: string | null | undefined,
): CamelotKey | null => {
    if (!value) {
        return null;
    }
    const match = CAMELOT_PATTERN.exec(value.trim().toUpperCase());
    if (!match) {
        return null;
    }
    return {
        number: Number.parseInt(match[1], 10),
        letter: match[2] === "A" ? "A" : "B",
    };
};

export const formatCamelotKey = (key: CamelotKey): string =>
    `${key.number}${key.letter}`;

/** Steps around the 12-position wheel, so 12 and 1 are one apart. */
export const camelotWheelDistance = (a: CamelotKey, b: CamelotKey): number => {
    const diff = Math.abs(a.number - b.number);
    return Math.min(diff, 12 - diff);
};
