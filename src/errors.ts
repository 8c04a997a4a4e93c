export abstract class MonitorError<K extends string = string> extends Error {
    readonly kind: K;

    protected constructor(kind: K, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = kind;
        this.name = new.target.name;
    }
}

export type AcquisitionErrorKind = 'exhausted' | 'rejected' | 'network';

export class AcquisitionError extends MonitorError<AcquisitionErrorKind> {
    readonly statusCode: number | null;

    constructor(
        kind: AcquisitionErrorKind,
        message: string,
        options: { statusCode?: number | null; cause?: unknown } = {},
    ) {
        super(kind, message, { cause: options.cause });
        this.statusCode = options.statusCode ?? null;
    }
}

export class ParseError extends MonitorError<'unrecognizedFormat'> {
    readonly input: string;

    constructor(input: unknown, field = 'price') {
        super('unrecognizedFormat', `Unrecognized ${field} format: ${JSON.stringify(input)}`);
        this.input = String(input);
    }
}

export class ClosureScanError extends MonitorError<'navigationFailed'> {
    readonly listingId: string;

    constructor(listingId: string, cause: unknown) {
        super('navigationFailed', `Could not load listing ${listingId}: ${toError(cause).message}`, { cause });
        this.listingId = listingId;
    }
}

export class PersistenceError extends MonitorError<'notFound' | 'writeFailed'> {
    readonly listingId: string | null;

    constructor(kind: 'notFound' | 'writeFailed', message: string, listingId: string | null, cause?: unknown) {
        super(kind, message, { cause });
        this.listingId = listingId;
    }
}

export class ConfigurationError extends MonitorError<'invalidInput'> {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('invalidInput', `Invalid input: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));
