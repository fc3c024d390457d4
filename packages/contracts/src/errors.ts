/**
 * Error kinds shared by the stores and the API.
 *
 * `statusCode` is the field Fastify's error handler reads when an error
 * escapes a route.
 */
export abstract class FacilityPulseError extends Error {
    abstract readonly statusCode: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Connectivity or constraint failure in a metric store. */
export class StorageError extends FacilityPulseError {
    readonly statusCode = 500;
}

/** Missing or invalid configuration / reference data (e.g. no HVAC statuses). */
export class ConfigError extends FacilityPulseError {
    readonly statusCode = 500;
}

/** Credentials rejected. The message never says which check failed. */
export class AuthError extends FacilityPulseError {
    readonly statusCode = 401;

    constructor() {
        super('Unauthorized');
    }
}

export class NotFoundError extends FacilityPulseError {
    readonly statusCode = 404;
}

/** Malformed request input, such as an unparsable timestamp. */
export class ValidationError extends FacilityPulseError {
    readonly statusCode = 400;
}

export function isFacilityPulseError(err: unknown): err is FacilityPulseError {
    return err instanceof FacilityPulseError;
}
