import dotenv from "dotenv";
import * as path from "path";
import { z } from "zod";
import { logger } from "./utils/logger";
import { parseEnvFloat, parseEnvInt } from "./utils/envParsers";
import { MIX_MODE_VALUES } from "./services/mixing/harmonicEngine";

dotenv.config();

// Validate environment variables on startup
const envSchema = z.object({
    PORT: z.string().regex(/^\d+$/, "PORT must be a number").optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
    POLICY_CONFIG_DIR: z.string().min(1).optional(),
    DEFAULT_MIX_MODE: z.enum(MIX_MODE_VALUES).optional(),
    MIN_COMPATIBILITY: z
        .string()
        .refine((value) => {
            const parsed = Number.parseFloat(value);
            return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1;
        }, "MIN_COMPATIBILITY must be between 0 and 1")
        .optional(),
    PLAYLIST_RANDOM_SEED: z.string().min(1).optional(),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
    logger.error(" Environment validation failed:");
    parsedEnv.error.errors.forEach((err) => {
        logger.error(`   - ${err.path.join(".")}: ${err.message}`);
    });
    logger.error(
        "\n Please check your .env file and ensure all variables are valid.",
    );
    process.exit(1);
}

logger.debug("Environment variables validated");

const env = parsedEnv.success ? parsedEnv.data : {};

/** Centralized runtime configuration for the HTTP surface and the mixing core. */
export const config = {
    port: parseEnvInt(env.PORT, 3010),
    nodeEnv: env.NODE_ENV || "development",

    policies: {
        configDir: path.resolve(env.POLICY_CONFIG_DIR || "./config/policies"),
    },

    mixing: {
        defaultMode: env.DEFAULT_MIX_MODE || "intelligent",
        minCompatibility: parseEnvFloat(env.MIN_COMPATIBILITY, 0.3),
        randomSeed: env.PLAYLIST_RANDOM_SEED || "mixflow",
    },
};

export type AppConfig = typeof config;
