/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the request and retry
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
    UNKNOWN_OPERATOR = "UNKNOWN_OPERATOR",
    DUPLICATE_POLICY = "DUPLICATE_POLICY",
    DUPLICATE_RULE_ID = "DUPLICATE_RULE_ID",
    BUILTIN_POLICY_READ_ONLY = "BUILTIN_POLICY_READ_ONLY",
    POLICY_NOT_FOUND = "POLICY_NOT_FOUND",

    // Policy document errors
    POLICY_IO_ERROR = "POLICY_IO_ERROR",
    POLICY_DOCUMENT_INVALID = "POLICY_DOCUMENT_INVALID",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    PERMISSION_DENIED = "PERMISSION_DENIED",
    DISK_FULL = "DISK_FULL",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: ErrorDetails,
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/** Rule or policy definitions that cannot be evaluated as written. */
export class PolicyConfigurationError extends AppError {
    constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
        super(code, ErrorCategory.RECOVERABLE, message, details);
        this.name = "PolicyConfigurationError";
        Object.setPrototypeOf(this, PolicyConfigurationError.prototype);
    }
}

export class PolicyNotFoundError extends AppError {
    constructor(public policyId: string) {
        super(
            ErrorCode.POLICY_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `Policy '${policyId}' not found`,
            { policyId },
        );
        this.name = "PolicyNotFoundError";
        Object.setPrototypeOf(this, PolicyNotFoundError.prototype);
    }
}

/**
 * Check if an error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function getNodeErrorCode(error: unknown): string | undefined {
    if (typeof error !== "object" || error === null || !("code" in error)) {
        return undefined;
    }
    const { code } = error;
    return typeof code === "string" ? code : undefined;
}

/**
 * Wrap a Node.js file system error raised while reading or writing a policy document
 */
export function wrapPolicyIoError(err: unknown, context: string): AppError {
    const details = { originalError: getErrorMessage(err) };
    const code = getNodeErrorCode(err);

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            details,
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details,
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details,
        );
    }

    return new AppError(
        ErrorCode.POLICY_IO_ERROR,
        ErrorCategory.RECOVERABLE,
        `Policy document I/O failed: ${context}`,
        details,
    );
}
