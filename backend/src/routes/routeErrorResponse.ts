import type { Response } from "express";
import {
    AppError,
    ErrorCode,
    PolicyNotFoundError,
    isRecoverable,
    isTransient,
} from "../utils/errors";

export type RouteErrorExtras = Record<string, unknown>;

export interface AppErrorBody {
    error: string;
    code: AppError["code"];
    category: AppError["category"];
    details?: AppError["details"];
}

/**
 * RECOVERABLE -> 400 (404 for a missing policy, 403 for a read-only one),
 * TRANSIENT -> 503, FATAL -> 500.
 */
export function statusForAppError(err: AppError): number {
    if (err instanceof PolicyNotFoundError) {
        return 404;
    }
    if (err.code === ErrorCode.BUILTIN_POLICY_READ_ONLY) {
        return 403;
    }
    if (isRecoverable(err)) {
        return 400;
    }
    if (isTransient(err)) {
        return 503;
    }
    return 500;
}

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras,
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

export const sendAppError = (
    res: Response,
    err: AppError,
    includeDetails = false,
): Response => {
    const body: AppErrorBody = {
        error: err.message,
        code: err.code,
        category: err.category,
    };
    if (includeDetails) {
        body.details = err.details;
    }
    return res.status(statusForAppError(err)).json(body);
};
