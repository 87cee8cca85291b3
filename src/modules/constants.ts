/**
 * Application Constants
 *
 * Fixed layout values for the CRUST2.0 archive and the Surfer grid formats.
 * Everything here describes a file format or the model's fixed geometry; none
 * of it is meant to be tuned at run time.
 */

// =============================================================================
// CRUST2.0 ARCHIVE
// =============================================================================

export const CRUST2_ARCHIVE = {
    URL: 'http://igpppublic.ucsd.edu/~gabi/ftp/crust2.tar.gz',
    DEFAULT_FILENAME: 'crust2.tar.gz',
    TOPOGRAPHY_MEMBER: './CNelevatio2.txt',   // Surface elevation, metres
    TYPES_MEMBER: './CNtype2.txt',            // 2-character type code per cell
    LEGEND_MEMBER: './CNtype2_key.txt'        // Layer stack per type code
} as const;

// =============================================================================
// GRID GEOMETRY
// =============================================================================

export const CRUST2_GRID = {
    CELL_SIZE_DEG: 2,
    ROWS: 90,                         // 90N .. 90S
    COLS: 180,                        // 180W .. 180E
    WEST_EDGE: -180,                  // West edge of column 0
    NORTH_EDGE: 90,                   // North edge of row 0
    HEADER_LINES: 1,                  // Column-label line above the data rows
    LABEL_COLUMNS: 1                  // Row-label column in front of each row
} as const;

// =============================================================================
// LAYER LEGEND
// =============================================================================

export const CRUST2_LEGEND = {
    HEADER_LINES: 5,
    LINES_PER_RECORD: 5,              // code, vp, vs, density, thickness
    CODE_LENGTH: 2,
    LAYER_COUNT: 7,                   // ice .. lower crust (mantle dropped)
    PROPERTY_FIELDS: 8,               // 7 layers + mantle
    UNIT_SCALE: 1000                  // km/s -> m/s, g/cm3 -> kg/m3, km -> m
} as const;

export const CRUST2_LAYER_NAMES = [
    'ice',
    'water',
    'soft sediments',
    'hard sediments',
    'upper crust',
    'middle crust',
    'lower crust'
] as const;

// =============================================================================
// SURFER GRIDS
// =============================================================================

export const SURFER = {
    ASCII_ID: 'DSAA',
    BINARY_ID: 'DSBB',
    HEADER_LINES: 5,
    BINARY_HEADER_BYTES: 56,          // id(4) + nx,ny int16 + 6 float64
    NODATA_THRESHOLD: 1.70141e38      // Surfer "blank" value; compare with >=
} as const;

// =============================================================================
// LOGGING
// =============================================================================

export const LOGGING = {
    ENV_VAR: 'CRUST_LOG_LEVEL',
    DEFAULT_LEVEL: 'warn'
} as const;
