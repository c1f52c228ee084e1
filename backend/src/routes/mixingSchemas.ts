import { z } from "zod";
import { STRUCTURAL_ELEMENT_VALUES } from "@mixflow/track-analysis-contract";
import { MIX_MODE_VALUES } from "../services/mixing/harmonicEngine";

const optionalNumber = z.number().finite().nullish();

export const trackSchema = z.object({
    id: z.string().min(1),
    title: z.string().default(""),
    artist: z.string().default(""),
    filePath: z.string().optional(),
    key: z.string().nullish(),
    bpm: optionalNumber,
    energy: optionalNumber,
    emotionalIntensity: optionalNumber,
    genre: z.string().nullish(),
    duration: optionalNumber,
    isAvailable: z.boolean().optional(),
});

const transitionPointSchema = z.object({
    timeSeconds: z.number().nonnegative(),
    confidence: z.number().min(0).max(1),
    elementType: z.enum(STRUCTURAL_ELEMENT_VALUES),
    energyLevel: z.number().min(0).max(1),
    beatStrength: z.number().min(0).max(1),
    mixSuitability: z.number().min(0).max(1),
});

export const structuralAnalysisSchema = z.object({
    trackId: z.string().min(1),
    duration: z.number().nonnegative(),
    introEnd: optionalNumber,
    outroStart: optionalNumber,
    beatGrid: z.array(z.number()).default([]),
    tempoChanges: z.array(z.tuple([z.number(), z.number()])).default([]),
    energyCurve: z.array(z.tuple([z.number(), z.number()])).default([]),
    transitionPoints: z.array(transitionPointSchema).default([]),
});

export const trackMetadataSchema = z.record(z.unknown());

export const mixModeSchema = z.enum(MIX_MODE_VALUES);

export const policyContextSchema = z.object({
    timeOfDay: z.string().optional(),
    activity: z.string().optional(),
});
