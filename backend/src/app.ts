import express from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import { errorHandler } from "./middleware/errorHandler";
import { apiLimiter } from "./middleware/rateLimiter";
import compatibilityRoutes from "./routes/compatibility";
import playlistsRoutes from "./routes/playlists";
import policiesRoutes from "./routes/policies";
import { harmonicMixingEngine, policyManager } from "./services/mixingServices";

const startedAt = Date.now();

function buildHealthPayload() {
    return {
        status: "ok",
        uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
        mixMode: harmonicMixingEngine.getMode(),
        enhancedScoring: harmonicMixingEngine.supportsEnhancedScoring(),
        policies: policyManager.listPolicies().length,
    };
}

export function createApp() {
    const app = express();

    app.use(
        helmet({
            crossOriginResourcePolicy: { policy: "cross-origin" },
        })
    );
    app.use(cors());
    app.use(
        compression({
            threshold: 1024,
            filter: (req, res) => {
                const cacheControl = res.getHeader("Cache-Control");
                if (
                    typeof cacheControl === "string" &&
                    cacheControl.includes("no-transform")
                ) {
                    return false;
                }
                return compression.filter(req, res);
            },
        })
    );
    // Track pools for playlist generation can run to a few thousand entries
    app.use(express.json({ limit: "1mb" }));

    app.use("/api/compatibility", apiLimiter, compatibilityRoutes);
    app.use("/api/playlists", apiLimiter, playlistsRoutes);
    app.use("/api/policies", apiLimiter, policiesRoutes);

    app.get("/api/health", (_req, res) => {
        res.json(buildHealthPayload());
    });

    app.use(errorHandler);

    return app;
}
