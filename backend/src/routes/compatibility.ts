import { Router } from "express";
import { z } from "zod";
import { MIX_MODE_WEIGHTS } from "../services/mixing/harmonicEngine";
import {
    enhancedCompatibilityEngine,
    harmonicMixingEngine,
} from "../services/mixingServices";
import {
    mixModeSchema,
    policyContextSchema,
    structuralAnalysisSchema,
    trackMetadataSchema,
    trackSchema,
} from "./mixingSchemas";
import { sendRouteError } from "./routeErrorResponse";

const router = Router();

const scoreSchema = z.object({
    trackA: trackSchema,
    trackB: trackSchema,
    mode: mixModeSchema.optional(),
});

const enhancedSchema = z.object({
    trackA: trackSchema,
    trackB: trackSchema,
    structuralA: structuralAnalysisSchema.optional(),
    structuralB: structuralAnalysisSchema.optional(),
    metadataA: trackMetadataSchema.optional(),
    metadataB: trackMetadataSchema.optional(),
    policyId: z.string().min(1).optional(),
    context: policyContextSchema.optional(),
});

const explainSchema = z.object({
    trackA: trackSchema,
    trackB: trackSchema,
    metadataA: trackMetadataSchema.optional(),
    metadataB: trackMetadataSchema.optional(),
});

const transitionSchema = z.object({
    trackA: trackSchema,
    trackB: trackSchema,
    structuralA: structuralAnalysisSchema,
    structuralB: structuralAnalysisSchema,
});

const bridgeSchema = z.object({
    metadataA: trackMetadataSchema,
    metadataB: trackMetadataSchema,
    candidates: z
        .array(z.object({ track: trackSchema, metadata: trackMetadataSchema.nullish() }))
        .max(500),
});

// POST /compatibility/score
router.post("/score", (req, res, next) => {
    try {
        const { trackA, trackB, mode } = scoreSchema.parse(req.body);
        const effectiveMode = mode ?? harmonicMixingEngine.getMode();
        const score = harmonicMixingEngine.calculateCompatibility(
            trackA,
            trackB,
            MIX_MODE_WEIGHTS[effectiveMode],
        );
        res.json({ score, mode: effectiveMode });
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /compatibility/enhanced
router.post("/enhanced", (req, res, next) => {
    try {
        const body = enhancedSchema.parse(req.body);

        if (body.policyId) {
            const score = enhancedCompatibilityEngine.calculatePolicyAwareCompatibility(
                body.trackA,
                body.trackB,
                {
                    structural1: body.structuralA,
                    structural2: body.structuralB,
                    metadata1: body.metadataA,
                    metadata2: body.metadataB,
                    policyId: body.policyId,
                    context: body.context,
                },
            );
            return res.json({ score, policyId: body.policyId });
        }

        const score = harmonicMixingEngine.calculateEnhancedCompatibility(
            body.trackA,
            body.trackB,
            { track1: body.structuralA, track2: body.structuralB },
            { track1: body.metadataA, track2: body.metadataB },
        );
        res.json({ score });
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /compatibility/explain
router.post("/explain", (req, res, next) => {
    try {
        const { trackA, trackB, metadataA, metadataB } = explainSchema.parse(req.body);
        res.json(
            enhancedCompatibilityEngine.getCompatibilityExplanation(
                trackA,
                trackB,
                metadataA,
                metadataB,
            ),
        );
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /compatibility/transition
router.post("/transition", (req, res, next) => {
    try {
        const { trackA, trackB, structuralA, structuralB } = transitionSchema.parse(req.body);
        const transition = enhancedCompatibilityEngine.findOptimalTransition(
            trackA,
            trackB,
            structuralA,
            structuralB,
        );
        if (!transition) {
            return sendRouteError(res, 404, "No viable transition points");
        }
        res.json(transition);
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// POST /compatibility/bridges
router.post("/bridges", (req, res, next) => {
    try {
        const { metadataA, metadataB, candidates } = bridgeSchema.parse(req.body);
        res.json({
            styleDistance: enhancedCompatibilityEngine.calculateStylisticCompatibilityDetailed(
                metadataA,
                metadataB,
            ),
            bridges: enhancedCompatibilityEngine.findStyleBridgeTracks(
                metadataA,
                metadataB,
                candidates,
            ),
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

export default router;
