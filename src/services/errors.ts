export class ApiClientError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The server refused the username/password pair. */
export class AuthenticationError extends ApiClientError { }

export class NotFoundError extends ApiClientError { }

/**
 * A write was rejected with field-level detail, e.g. `{ name: ['This field is required.'] }`.
 */
export class ValidationError extends ApiClientError {
    readonly fieldErrors: Record<string, string[]>;

    constructor(message: string, fieldErrors: Record<string, string[]>) {
        super(message);
        this.fieldErrors = fieldErrors;
    }
}

/** Any other non-success status, a transport failure, or an unusable response body. */
export class RequestError extends ApiClientError {
    readonly status?: number;

    constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.status = options.status;
    }
}

export class TimeseriesFormatError extends ApiClientError {
    readonly line: number;

    constructor(message: string, line: number) {
        super(`${message} (line ${line})`);
        this.line = line;
    }
}
