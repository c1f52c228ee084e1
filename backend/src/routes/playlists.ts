import { Router } from "express";
import { z } from "zod";
import {
    DEFAULT_VARIATION_COUNT,
    PlaylistGenerationRequest,
} from "../services/mixing/contextualPlaylistGenerator";
import {
    HarmonicMixingEngine,
    PROGRESSION_CURVE_VALUES,
} from "../services/mixing/harmonicEngine";
import {
    DEFAULT_SEQUENCE_LENGTH,
    LINGUISTIC_FLOW_VALUES,
    TEMPORAL_FLOW_VALUES,
} from "../services/mixing/temporalLinguisticSequencer";
import {
    contextualPlaylistGenerator,
    enhancedCompatibilityEngine,
    harmonicMixingEngine,
    temporalLinguisticSequencer,
} from "../services/mixingServices";
import { config } from "../config";
import { mixModeSchema, trackMetadataSchema, trackSchema } from "./mixingSchemas";

const router = Router();

const MAX_POOL_SIZE = 2000;
const MAX_TARGET_LENGTH = 500;

const trackPoolSchema = z.array(trackSchema).max(MAX_POOL_SIZE);

const generateSchema = z.object({
    tracks: trackPoolSchema,
    startTrackId: z.string().min(1).optional(),
    targetLength: z.number().int().positive().max(MAX_TARGET_LENGTH).default(10),
    progressionCurve: z.enum(PROGRESSION_CURVE_VALUES).default("neutral"),
    mode: mixModeSchema.optional(),
});

const contextualSchema = z.object({
    tracks: trackPoolSchema,
    metadata: z.record(trackMetadataSchema).optional(),
    targetLength: z.number().int().positive().max(MAX_TARGET_LENGTH).optional(),
    timeOfDay: z.string().optional(),
    activity: z.string().optional(),
    moodPreference: z.string().optional(),
    season: z.string().optional(),
    energyPreference: z.string().optional(),
    durationMinutes: z.number().int().positive().optional(),
    startTrackId: z.string().min(1).optional(),
    allowRepeats: z.boolean().optional(),
    minCompatibility: z.number().min(0).max(1).optional(),
});

const variationsSchema = contextualSchema.extend({
    count: z.number().int().positive().max(10).default(DEFAULT_VARIATION_COUNT),
});

const culturalSchema = z.object({
    tracks: trackPoolSchema,
    metadata: z.record(trackMetadataSchema).default({}),
    targetLength: z
        .number()
        .int()
        .positive()
        .max(MAX_TARGET_LENGTH)
        .default(DEFAULT_SEQUENCE_LENGTH),
    sequence: z.enum(["temporal", "linguistic", "combined"]).default("combined"),
    temporalFlow: z.enum(TEMPORAL_FLOW_VALUES).optional(),
    linguisticFlow: z.enum(LINGUISTIC_FLOW_VALUES).optional(),
});

function toGenerationRequest(
    body: z.infer<typeof contextualSchema>,
): PlaylistGenerationRequest {
    return {
        ...body,
        minCompatibility: body.minCompatibility ?? config.mixing.minCompatibility,
    };
}

// POST /playlists/generate
router.post("/generate", (req, res, next) => {
    try {
        const body = generateSchema.parse(req.body);

        // A per-request mode gets its own engine so the shared one keeps its weights
        const engine =
            body.mode && body.mode !== harmonicMixingEngine.getMode()
                ? new HarmonicMixingEngine({
                      mode: body.mode,
                      enhancedScorer: enhancedCompatibilityEngine,
                  })
                : harmonicMixingEngine;

        const startTrack = body.startTrackId
            ? body.tracks.find((track) => track.id === body.startTrackId)
            : undefined;
        // A start track outside the pool yields an empty playlist
        if (body.startTrackId && !startTrack) {
            return res.json({ tracks: [], mode: engine.getMode() });
        }

        const tracks = engine.generatePlaylist(
            body.tracks,
            startTrack,
            body.targetLength,
            body.progressionCurve,
        );
        res.json({ tracks, mode: engine.getMode() });
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /playlists/contextual
router.post("/contextual", (req, res, next) => {
    try {
        const body = contextualSchema.parse(req.body);
        const result = contextualPlaylistGenerator.generateContextualPlaylist(
            toGenerationRequest(body),
        );
        res.json({
            ...result,
            explanation: contextualPlaylistGenerator.explainPlaylistGeneration(result),
        });
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /playlists/contextual/variations
router.post("/contextual/variations", (req, res, next) => {
    try {
        const { count, ...body } = variationsSchema.parse(req.body);
        const results = contextualPlaylistGenerator.generateMultiplePlaylists(
            toGenerationRequest(body),
            count,
        );
        res.json({ results });
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /playlists/cultural
router.post("/cultural", (req, res, next) => {
    try {
        const body = culturalSchema.parse(req.body);
        switch (body.sequence) {
            case "temporal":
                return res.json(
                    temporalLinguisticSequencer.createTemporalSequence(
                        body.tracks,
                        body.metadata,
                        body.temporalFlow,
                        body.targetLength,
                    ),
                );
            case "linguistic":
                return res.json(
                    temporalLinguisticSequencer.createLinguisticSequence(
                        body.tracks,
                        body.metadata,
                        body.linguisticFlow,
                        body.targetLength,
                    ),
                );
            case "combined":
                return res.json(
                    temporalLinguisticSequencer.createCombinedSequence(
                        body.tracks,
                        body.metadata,
                        body.temporalFlow,
                        body.linguisticFlow,
                        body.targetLength,
                    ),
                );
        }
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

export default router;
