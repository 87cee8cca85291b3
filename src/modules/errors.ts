/**
 * Error taxonomy shared by the archive, grid and model modules.
 */

export class CrustError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The archive could not be opened, or a member is missing. */
export class ArchiveError extends CrustError {}

/**
 * Structural mismatch in a text or binary layout: wrong token count, wrong
 * matrix shape, non-numeric token in a numeric field.
 */
export class ParseError extends CrustError {
    readonly source: string;
    readonly line: number | null;

    constructor(source: string, message: string, line: number | null = null) {
        super(line === null ? `${source}: ${message}` : `${source}:${line}: ${message}`);
        this.source = source;
        this.line = line;
    }
}

/** A grid cell refers to a type code the codec does not define. */
export class LookupError extends CrustError {
    readonly code: string;
    readonly row: number;
    readonly col: number;

    constructor(code: string, row: number, col: number) {
        super(`Type code "${code}" at row ${row}, column ${col} is not in the codec`);
        this.code = code;
        this.row = row;
        this.col = col;
    }
}

/** The archive download answered with a non-success HTTP status. */
export class FetchError extends CrustError {
    readonly status: number;

    constructor(url: string, status: number, statusText: string) {
        super(`Failed to fetch ${url}: ${status} ${statusText}`);
        this.status = status;
    }
}
