export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for errors that map to a structured HTTP response.
 */
export class ApiError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly details: ErrorDetails = {},
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidApiKeyError extends ApiError {
    constructor(reason: 'missing' | 'invalid') {
        super(401, 'Invalid or missing API key', {
            reason,
            header_format: 'X-API-Key: your_api_key_here',
        });
    }
}

export class NotFoundError extends ApiError {
    constructor(resourceType: string, identifier: string) {
        super(404, `${resourceType} not found`, { identifier });
    }
}

export interface FieldIssue {
    field: string;
    message: string;
}

export class ValidationError extends ApiError {
    constructor(public readonly issues: FieldIssue[]) {
        super(422, 'Validation error', { errors: issues });
    }
}

/** A unique-constraint violation, e.g. a fingerprint that already exists. */
export class ConflictError extends ApiError {
    constructor(message: string) {
        super(409, message);
    }
}

export class CredentialIssuanceError extends ApiError {
    constructor(attempts: number) {
        super(500, 'Unable to issue API key', { attempts });
    }
}

export class ConfigError extends Error {
    constructor(public readonly fields: string[]) {
        super(`Invalid configuration: ${fields.join(', ')}`);
        this.name = 'ConfigError';
    }
}
