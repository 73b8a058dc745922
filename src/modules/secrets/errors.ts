/**
 * The fixed error vocabulary the secret service speaks to its transports.
 *
 * `NOT_FOUND` deliberately covers unknown, expired and already revealed
 * secrets alike.
 */
export type SecretErrorCode =
    | 'VALIDATION_FAILED'
    | 'NOT_FOUND'
    | 'CHALLENGE_FAILED'
    | 'STORAGE_FAILURE';

export interface SecretFailure {
    code: SecretErrorCode;
    message: string;
    details?: unknown;
}

/** Result-object shape returned for every failed service call */
export type Failed = { error: SecretFailure };

const messages: Record<SecretErrorCode, string> = {
    VALIDATION_FAILED: 'Invalid secret',
    NOT_FOUND: 'Secret not found',
    CHALLENGE_FAILED: 'Answer does not match',
    STORAGE_FAILURE: 'Secret storage unavailable',
};

const httpStatus: Record<SecretErrorCode, number> = {
    VALIDATION_FAILED: 400,
    NOT_FOUND: 404,
    CHALLENGE_FAILED: 403,
    STORAGE_FAILURE: 503,
};

export function fail(code: SecretErrorCode, details?: unknown): Failed {
    return details === undefined
        ? { error: { code, message: messages[code] } }
        : { error: { code, message: messages[code], details } };
}

export function toHttpStatus(code: SecretErrorCode): number {
    return httpStatus[code];
}

export function isFailed<T extends object>(result: T | Failed): result is Failed {
    return 'error' in result;
}

/**
 * Thrown by the model and the stores when a secret violates its invariants.
 * The service reports it as `VALIDATION_FAILED`.
 */
export class InvalidSecretError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid secret: ${issues.join('; ')}`);
        this.name = 'InvalidSecretError';
        this.issues = issues;
    }
}
