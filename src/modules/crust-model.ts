/**
 * CRUST2.0 Model Assembler
 *
 * Converts the CRUST2.0 global crustal model into tesseroids. Each 2x2 degree
 * cell contributes one tesseroid per layer of non-zero thickness (ice, water,
 * soft sediments, hard sediments, upper, middle and lower crust), stacked
 * downward from the cell's surface elevation. The mantle below the Moho has
 * no bottom and is not converted.
 */

import { CrustArchive } from './archive-loader.js';
import { loadCodec, type Codec } from './crust-codec.js';
import { loadTopography, loadTypeGrid, type TopographyMatrix, type TypeCodeGrid } from './crust-grids.js';
import { CRUST2_GRID, CRUST2_LEGEND } from './constants.js';
import { LookupError, ParseError } from './errors.js';
import { Logger } from './logger.js';
import { Tesseroid, type TesseroidProps } from './tesseroid.js';

const log = Logger.getLogger('CrustModel');

export interface GridCell {
    row: number;
    col: number;
}

export interface CellFootprint {
    west: number;
    east: number;
    south: number;
    north: number;
}

/** West edges of the first `cols` columns: -180, -178, ... */
export function longitudeAxis(cols: number = CRUST2_GRID.COLS): number[] {
    return Array.from({ length: cols }, (_, j) => CRUST2_GRID.WEST_EDGE + j * CRUST2_GRID.CELL_SIZE_DEG);
}

/** North edges of the first `rows` rows: 90, 88, ... */
export function latitudeAxis(rows: number = CRUST2_GRID.ROWS): number[] {
    return Array.from({ length: rows }, (_, i) => CRUST2_GRID.NORTH_EDGE - i * CRUST2_GRID.CELL_SIZE_DEG);
}

export function cellFootprint({ row, col }: GridCell): CellFootprint {
    const size = CRUST2_GRID.CELL_SIZE_DEG;
    const west = CRUST2_GRID.WEST_EDGE + col * size;
    const north = CRUST2_GRID.NORTH_EDGE - row * size;
    return { west, east: west + size, south: north - size, north };
}

/**
 * Tesseroids for a single cell, shallowest first. Pure: the result depends
 * only on the arguments.
 *
 * Throws LookupError if `code` is not in the codec; nothing is produced for
 * the cell in that case.
 */
export function cellTesseroids(cell: GridCell, code: string, surface: number, codec: Codec): Tesseroid[] {
    const stack = codec.get(code);
    if (!stack) {
        throw new LookupError(code, cell.row, cell.col);
    }

    const { west, east, south, north } = cellFootprint(cell);
    const tesseroids: Tesseroid[] = [];
    let top = surface;

    for (let layer = 0; layer < CRUST2_LEGEND.LAYER_COUNT; layer++) {
        const thickness = stack.thickness[layer];
        if (thickness <= 0) continue;

        const bottom = top - thickness;
        const props: TesseroidProps = {
            density: stack.density[layer],
            vp: stack.vp[layer],
            vs: stack.vs[layer]
        };
        tesseroids.push(new Tesseroid(west, east, south, north, top, bottom, props));
        top = bottom;
    }

    return tesseroids;
}

/**
 * Walk the grid in row-major order and collect every cell's tesseroids.
 * The two matrices must have the same shape.
 */
export function assembleModel(topography: TopographyMatrix, types: TypeCodeGrid, codec: Codec): Tesseroid[] {
    if (topography.length !== types.length) {
        throw new ParseError('model', `topography has ${topography.length} rows but type grid has ${types.length}`);
    }

    const model: Tesseroid[] = [];
    for (let row = 0; row < types.length; row++) {
        if (topography[row].length !== types[row].length) {
            throw new ParseError(
                'model',
                `row ${row}: topography has ${topography[row].length} columns but type grid has ${types[row].length}`
            );
        }
        for (let col = 0; col < types[row].length; col++) {
            const cell = { row, col };
            model.push(...cellTesseroids(cell, types[row][col], topography[row][col], codec));
        }
    }

    log.info(`Model assembled: ${model.length} tesseroids from ${types.length * (types[0]?.length ?? 0)} cells`);
    return model;
}

/**
 * Convert the CRUST2.0 archive at `path` to tesseroids. Each tesseroid's
 * props carry the layer's density, vp and vs in SI units.
 */
export function crust2ToTesseroids(path: string): Tesseroid[] {
    const archive = CrustArchive.open(path);
    try {
        const topography = loadTopography(archive);
        const codec = loadCodec(archive);
        const types = loadTypeGrid(archive);
        return assembleModel(topography, types, codec);
    } finally {
        archive.close();
    }
}

// =============================================================================
// SUMMARY
// =============================================================================

export interface ValueRange {
    min: number;
    max: number;
}

export interface ModelSummary {
    count: number;
    top: number;        // highest top
    bottom: number;     // deepest bottom
    density: ValueRange;
    vp: ValueRange;
    vs: ValueRange;
}

function widen(range: ValueRange, value: number): void {
    if (value < range.min) range.min = value;
    if (value > range.max) range.max = value;
}

/**
 * Aggregate extents of a model. Ranges are NaN for an empty model.
 */
export function summarizeModel(model: readonly Tesseroid[]): ModelSummary {
    if (model.length === 0) {
        const empty = (): ValueRange => ({ min: NaN, max: NaN });
        return { count: 0, top: NaN, bottom: NaN, density: empty(), vp: empty(), vs: empty() };
    }

    const first = model[0];
    const summary: ModelSummary = {
        count: model.length,
        top: first.top,
        bottom: first.bottom,
        density: { min: first.props.density, max: first.props.density },
        vp: { min: first.props.vp, max: first.props.vp },
        vs: { min: first.props.vs, max: first.props.vs }
    };

    for (const t of model) {
        if (t.top > summary.top) summary.top = t.top;
        if (t.bottom < summary.bottom) summary.bottom = t.bottom;
        widen(summary.density, t.props.density);
        widen(summary.vp, t.props.vp);
        widen(summary.vs, t.props.vs);
    }

    return summary;
}
