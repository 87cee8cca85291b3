/**
 * Text Table Module
 *
 * Whitespace-delimited table parsing shared by the CRUST2.0 grid loaders and
 * the Surfer ASCII loader. Blank lines are skipped; every other line is one
 * row and every row must have the same number of tokens.
 */

import { ParseError } from './errors.js';

const decoder = new TextDecoder('utf-8');

export interface TableOptions {
    /** Name used in error messages (archive member or file path) */
    source: string;
    /** Lines consumed before the first row, counted before blank-line removal */
    skipLines?: number;
    /** Leading columns dropped from every row after validation */
    dropColumns?: number;
    /** Required row count */
    rows?: number;
    /** Required column count, after dropColumns */
    cols?: number;
}

/** A 1-based line number paired with its text. */
export interface NumberedLine {
    line: number;
    text: string;
}

export function decodeText(bytes: Uint8Array): string {
    return decoder.decode(bytes);
}

export function splitLines(text: string): string[] {
    const lines = text.split(/\r?\n/);
    // A final newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return lines;
}

export function tokenize(text: string): string[] {
    const trimmed = text.trim();
    return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/**
 * Lines after the first `skip`, with blank ones removed and their original
 * line numbers kept for error reporting.
 */
export function contentLines(text: string, skip = 0): NumberedLine[] {
    const result: NumberedLine[] = [];
    const lines = splitLines(text);
    for (let i = skip; i < lines.length; i++) {
        if (lines[i].trim() === '') continue;
        result.push({ line: i + 1, text: lines[i] });
    }
    return result;
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_VALUES: Record<string, number> = {
    nan: NaN,
    inf: Infinity,
    infinity: Infinity
};

/**
 * Strict decimal parse. Unlike Number(), rejects empty strings, hex literals
 * and trailing garbage. Accepts nan/inf spellings with an optional sign.
 */
export function parseNumber(token: string, source: string, line: number | null = null): number {
    if (NUMBER_PATTERN.test(token)) return Number(token);

    const sign = token.startsWith('-') ? -1 : 1;
    const word = token.replace(/^[+-]/, '').toLowerCase();
    if (Object.prototype.hasOwnProperty.call(SPECIAL_VALUES, word)) {
        return sign * SPECIAL_VALUES[word];
    }
    throw new ParseError(source, `"${token}" is not a number`, line);
}

/**
 * Parse a table, converting each kept token with `convert`. Throws ParseError
 * on ragged rows or when the shape differs from options.rows/options.cols.
 */
export function parseTable<T>(
    text: string,
    options: TableOptions,
    convert: (token: string, line: number) => T
): T[][] {
    const { source, skipLines = 0, dropColumns = 0, rows, cols } = options;
    const lines = contentLines(text, skipLines);

    if (rows !== undefined && lines.length !== rows) {
        throw new ParseError(source, `expected ${rows} rows, found ${lines.length}`);
    }

    const table: T[][] = [];
    let width: number | null = cols === undefined ? null : cols + dropColumns;

    for (const { line, text: rowText } of lines) {
        const tokens = tokenize(rowText);
        if (width === null) {
            width = tokens.length;
        }
        if (tokens.length !== width) {
            throw new ParseError(source, `expected ${width} columns, found ${tokens.length}`, line);
        }
        if (tokens.length <= dropColumns) {
            throw new ParseError(source, 'row has no values after the label columns', line);
        }
        table.push(tokens.slice(dropColumns).map(token => convert(token, line)));
    }

    return table;
}

export function parseNumericTable(text: string, options: TableOptions): number[][] {
    return parseTable(text, options, (token, line) => parseNumber(token, options.source, line));
}

export function parseStringTable(text: string, options: TableOptions): string[][] {
    return parseTable(text, options, token => token);
}
