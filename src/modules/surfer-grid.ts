/**
 * Surfer Grid Loader
 *
 * Reads Surfer grid files (Golden Software) into longitude/latitude axes and a
 * value matrix. Blanked nodes (>= 1.70141e38) become NaN.
 *
 * ASCII grid (DSAA):
 *
 *   DSAA            id
 *   nx ny           number of columns and rows
 *   xmin xmax
 *   ymin ymax
 *   zmin zmax
 *   z11 z21 ...     ny rows of nx values, starting at ymin
 *
 * Binary grid (Surfer 6, DSBB), little-endian:
 *
 *   char[4] id, int16 nx, int16 ny, float64 xmin xmax ymin ymax zmin zmax,
 *   then nx*ny float32 values in the same row order.
 */

import { readFileSync } from 'fs';
import { SURFER } from './constants.js';
import { ParseError } from './errors.js';
import { Logger } from './logger.js';
import { decodeText, parseNumber, parseNumericTable, splitLines, tokenize } from './text-table.js';

const log = Logger.getLogger('SurferGrid');

export type SurferFormat = 'ascii' | 'binary';

export interface SurferGrid {
    /** Column coordinates (longitude), length nx, xmin..xmax */
    lon: number[];
    /** Row coordinates (latitude), length ny, ymin..ymax */
    lat: number[];
    /** ny x nx values, NaN where blanked */
    grid: number[][];
}

interface GridHeader {
    nx: number;
    ny: number;
    xmin: number;
    xmax: number;
    ymin: number;
    ymax: number;
    zmin: number;
    zmax: number;
}

/**
 * `num` evenly spaced values from `start` to `stop` inclusive.
 */
export function linspace(start: number, stop: number, num: number): number[] {
    if (num <= 0) return [];
    if (num === 1) return [start];
    const step = (stop - start) / (num - 1);
    const values = Array.from({ length: num }, (_, i) => start + i * step);
    values[num - 1] = stop;
    return values;
}

export function isBlank(value: number): boolean {
    return value >= SURFER.NODATA_THRESHOLD;
}

function buildGrid(header: GridHeader, grid: number[][]): SurferGrid {
    let blanks = 0;
    for (const row of grid) {
        for (let j = 0; j < row.length; j++) {
            if (isBlank(row[j])) {
                row[j] = NaN;
                blanks++;
            }
        }
    }
    if (blanks > 0) log.debug(`${blanks} blank nodes replaced with NaN`);

    return {
        lon: linspace(header.xmin, header.xmax, header.nx),
        lat: linspace(header.ymin, header.ymax, header.ny),
        grid
    };
}

// =============================================================================
// ASCII
// =============================================================================

function headerPair(line: string | undefined, name: string, source: string, lineNo: number): [number, number] {
    const tokens = tokenize(line ?? '');
    if (tokens.length !== 2) {
        throw new ParseError(source, `expected "${name}" (2 values), found ${tokens.length} values`, lineNo);
    }
    return [parseNumber(tokens[0], source, lineNo), parseNumber(tokens[1], source, lineNo)];
}

function dimension(value: number, name: string, source: string, line: number | null = null): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ParseError(source, `${name} must be a positive integer, got ${value}`, line);
    }
    return value;
}

function parseAsciiHeader(lines: string[], source: string): GridHeader {
    if (lines.length < SURFER.HEADER_LINES) {
        throw new ParseError(source, `header needs ${SURFER.HEADER_LINES} lines, found ${lines.length}`);
    }

    const id = lines[0].trim();
    if (id !== SURFER.ASCII_ID) {
        log.warn(`${source}: unexpected grid id "${id}", reading as ${SURFER.ASCII_ID}`);
    }

    const [nxRaw, nyRaw] = headerPair(lines[1], 'nx ny', source, 2);
    const [xmin, xmax] = headerPair(lines[2], 'xmin xmax', source, 3);
    const [ymin, ymax] = headerPair(lines[3], 'ymin ymax', source, 4);
    const [zmin, zmax] = headerPair(lines[4], 'zmin zmax', source, 5);

    return {
        nx: dimension(nxRaw, 'nx', source, 2),
        ny: dimension(nyRaw, 'ny', source, 2),
        xmin, xmax, ymin, ymax, zmin, zmax
    };
}

export function parseSurferAscii(text: string, source = '<surfer>'): SurferGrid {
    const header = parseAsciiHeader(splitLines(text), source);
    const grid = parseNumericTable(text, {
        source,
        skipLines: SURFER.HEADER_LINES,
        rows: header.ny,
        cols: header.nx
    });
    return buildGrid(header, grid);
}

// =============================================================================
// BINARY
// =============================================================================

export function parseSurferBinary(bytes: Uint8Array, source = '<surfer>'): SurferGrid {
    if (bytes.length < SURFER.BINARY_HEADER_BYTES) {
        throw new ParseError(source, `header needs ${SURFER.BINARY_HEADER_BYTES} bytes, found ${bytes.length}`);
    }

    const id = String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);
    if (id !== SURFER.BINARY_ID) {
        throw new ParseError(source, `expected grid id "${SURFER.BINARY_ID}", found "${id}"`);
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const header: GridHeader = {
        nx: dimension(view.getInt16(4, true), 'nx', source),
        ny: dimension(view.getInt16(6, true), 'ny', source),
        xmin: view.getFloat64(8, true),
        xmax: view.getFloat64(16, true),
        ymin: view.getFloat64(24, true),
        ymax: view.getFloat64(32, true),
        zmin: view.getFloat64(40, true),
        zmax: view.getFloat64(48, true)
    };

    const expected = SURFER.BINARY_HEADER_BYTES + header.nx * header.ny * 4;
    if (bytes.length !== expected) {
        throw new ParseError(source, `expected ${expected} bytes for a ${header.nx} x ${header.ny} grid, found ${bytes.length}`);
    }

    const grid: number[][] = [];
    let offset = SURFER.BINARY_HEADER_BYTES;
    for (let i = 0; i < header.ny; i++) {
        const row: number[] = new Array(header.nx);
        for (let j = 0; j < header.nx; j++) {
            row[j] = view.getFloat32(offset, true);
            offset += 4;
        }
        grid.push(row);
    }
    return buildGrid(header, grid);
}

// =============================================================================
// FILES
// =============================================================================

/**
 * Read a Surfer grid file.
 *
 * @returns lon (nx), lat (ny) and the ny x nx grid
 */
export function loadSurfer(path: string, format: SurferFormat = 'ascii'): SurferGrid {
    const bytes = readFileSync(path);
    const result = format === 'binary'
        ? parseSurferBinary(bytes, path)
        : parseSurferAscii(decodeText(bytes), path);
    log.info(`Loaded ${format} grid ${path}: ${result.lon.length} x ${result.lat.length}`);
    return result;
}
