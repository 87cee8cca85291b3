/**
 * CRUST2.0 Grid Loaders
 *
 * The topography and type-code members share one layout: a column-label
 * header line, then 90 rows of `<row label> v1 ... v180`, north to south,
 * each row west to east from 180W.
 */

import { CRUST2_ARCHIVE, CRUST2_GRID } from './constants.js';
import type { CrustArchive } from './archive-loader.js';
import { Logger } from './logger.js';
import { decodeText, parseNumericTable, parseStringTable, type TableOptions } from './text-table.js';

const log = Logger.getLogger('CrustGrids');

/** Surface elevation in metres (positive up), indexed [row][col]. */
export type TopographyMatrix = number[][];

/** Two-character type code per cell, indexed [row][col]. */
export type TypeCodeGrid = string[][];

function gridLayout(source: string): TableOptions {
    return {
        source,
        skipLines: CRUST2_GRID.HEADER_LINES,
        dropColumns: CRUST2_GRID.LABEL_COLUMNS,
        rows: CRUST2_GRID.ROWS,
        cols: CRUST2_GRID.COLS
    };
}

export function parseTopography(text: string, source: string = CRUST2_ARCHIVE.TOPOGRAPHY_MEMBER): TopographyMatrix {
    return parseNumericTable(text, gridLayout(source));
}

export function parseTypeGrid(text: string, source: string = CRUST2_ARCHIVE.TYPES_MEMBER): TypeCodeGrid {
    return parseStringTable(text, gridLayout(source));
}

export function loadTopography(archive: CrustArchive): TopographyMatrix {
    const member = CRUST2_ARCHIVE.TOPOGRAPHY_MEMBER;
    const topography = parseTopography(decodeText(archive.extract(member)), member);
    log.info(`Topography loaded: ${topography.length} x ${topography[0]?.length ?? 0}`);
    return topography;
}

export function loadTypeGrid(archive: CrustArchive): TypeCodeGrid {
    const member = CRUST2_ARCHIVE.TYPES_MEMBER;
    const types = parseTypeGrid(decodeText(archive.extract(member)), member);
    log.info(`Type codes loaded: ${types.length} x ${types[0]?.length ?? 0}`);
    return types;
}
