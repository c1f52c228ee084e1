import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError } from "../utils/errors";
import { config } from "../config";
import { sendAppError } from "../routes/routeErrorResponse";

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction,
) {
    if (err instanceof AppError) {
        logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);
        return sendAppError(res, err, config.nodeEnv === "development");
    }

    logger.error("Unhandled error:", err.stack);

    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    return res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
