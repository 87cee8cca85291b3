export { CrustArchive, normalizeMemberName, type ArchiveFormat } from './modules/archive-loader.js';
export { parseCodec, loadCodec, type Codec, type LayerStack } from './modules/crust-codec.js';
export {
    parseTopography,
    parseTypeGrid,
    loadTopography,
    loadTypeGrid,
    type TopographyMatrix,
    type TypeCodeGrid
} from './modules/crust-grids.js';
export {
    assembleModel,
    cellFootprint,
    cellTesseroids,
    crust2ToTesseroids,
    latitudeAxis,
    longitudeAxis,
    summarizeModel,
    type CellFootprint,
    type GridCell,
    type ModelSummary,
    type ValueRange
} from './modules/crust-model.js';
export { fetchCrust2, type FetchOptions } from './modules/crust-fetch.js';
export {
    isBlank,
    linspace,
    loadSurfer,
    parseSurferAscii,
    parseSurferBinary,
    type SurferFormat,
    type SurferGrid
} from './modules/surfer-grid.js';
export { Tesseroid, type TesseroidProps } from './modules/tesseroid.js';
export { ArchiveError, CrustError, FetchError, LookupError, ParseError } from './modules/errors.js';
export { Logger, type LogLevelName, type ModuleLogger } from './modules/logger.js';
export { CRUST2_ARCHIVE, CRUST2_GRID, CRUST2_LAYER_NAMES, CRUST2_LEGEND, SURFER } from './modules/constants.js';
