import { Router } from "express";
import { z } from "zod";
import {
    mixingPolicyDocumentSchema,
    mixingPolicyUpdateSchema,
    policyFromDocument,
    policyToDocument,
    policyUpdateFromDocument,
    ruleSetToDocument,
} from "../services/policies/policySchemas";
import { policyManager } from "../services/mixingServices";
import { policyContextSchema, trackMetadataSchema, trackSchema } from "./mixingSchemas";
import { sendRouteError } from "./routeErrorResponse";

const router = Router();

const applySchema = z.object({
    tracks: z.array(trackSchema).max(2000),
    metadata: z.record(trackMetadataSchema).optional(),
    context: policyContextSchema.optional(),
});

// GET /policies
router.get("/", (_req, res) => {
    res.json({ policies: policyManager.listPolicies().map(policyToDocument) });
});

// GET /policies/rule-sets
router.get("/rule-sets", (_req, res) => {
    res.json({ ruleSets: policyManager.listRuleSets().map(ruleSetToDocument) });
});

// POST /policies
router.post("/", (req, res, next) => {
    try {
        const document = mixingPolicyDocumentSchema.parse(req.body);
        const created = policyManager.createPolicy(policyFromDocument(document));
        res.status(201).json(policyToDocument(created));
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// GET /policies/:id
router.get("/:id", (req, res) => {
    const policy = policyManager.getPolicy(req.params.id);
    if (!policy) {
        return sendRouteError(res, 404, "Policy not found", { policyId: req.params.id });
    }
    res.json(policyToDocument(policy));
});

// PATCH /policies/:id
router.patch("/:id", (req, res, next) => {
    try {
        const updates = mixingPolicyUpdateSchema.parse(req.body);
        if (!policyManager.updatePolicy(req.params.id, policyUpdateFromDocument(updates))) {
            return sendRouteError(res, 404, "Policy not found", { policyId: req.params.id });
        }

        const updated = policyManager.getPolicy(req.params.id);
        res.json(updated ? policyToDocument(updated) : { id: req.params.id });
    } catch (error) {
        if (error instanceof z.ZodError) {
            return res
                .status(400)
                .json({ error: "Invalid request", details: error.errors });
        }
        next(error);
    }
});

// DELETE /policies/:id
router.delete("/:id", (req, res, next) => {
    try {
        const policy = policyManager.getPolicy(req.params.id);
        if (!policy) {
            return sendRouteError(res, 404, "Policy not found", { policyId: req.params.id });
        }
        if (!policyManager.deletePolicy(req.params.id)) {
            return sendRouteError(res, 403, "Built-in policies cannot be deleted", {
                policyId: req.params.id,
            });
        }
        res.status(204).send();
    } catch (error) {
        next(error);
    }
});

// POST /policies/:id/apply
router.post("/:id/apply", (req, res, next) => {
    try {
        const { tracks, metadata, context } = applySchema.parse(req.body);
        const results = policyManager.applyPolicy(req.params.id, tracks, metadata, context);
        res.json({ policyId: req.params.id, results });
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
