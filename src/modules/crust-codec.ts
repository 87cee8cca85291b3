/**
 * CRUST2.0 Layer Codec
 *
 * Decodes the type-code legend (CNtype2_key.txt) into a map from type code
 * to its seven-layer stack of physical properties in SI units.
 *
 * Legend layout after a 5-line header, blank lines ignored, one record per
 * five lines:
 *
 *   A1  <description>              code = first two characters
 *   vp        x8  (km/s)           layers 1-7 + mantle
 *   vs        x8  (km/s)
 *   density   x8  (g/cm3)
 *   thickness x7+ (km)             anything past the 7th (mantle) is dropped
 */

import { CRUST2_ARCHIVE, CRUST2_LAYER_NAMES, CRUST2_LEGEND } from './constants.js';
import type { CrustArchive } from './archive-loader.js';
import { ParseError } from './errors.js';
import { Logger } from './logger.js';
import { contentLines, decodeText, parseNumber, tokenize } from './text-table.js';

const log = Logger.getLogger('CrustCodec');

/**
 * Physical properties of the seven crustal layers of one type code, surface
 * to depth. Every array has exactly CRUST2_LEGEND.LAYER_COUNT entries.
 */
export interface LayerStack {
    readonly vp: readonly number[];        // m/s
    readonly vs: readonly number[];        // m/s
    readonly density: readonly number[];   // kg/m3
    readonly thickness: readonly number[]; // m
}

export type Codec = ReadonlyMap<string, LayerStack>;

type RecordState = 'code' | 'vp' | 'vs' | 'density' | 'thickness';

const NEXT_STATE: Record<RecordState, RecordState> = {
    code: 'vp',
    vp: 'vs',
    vs: 'density',
    density: 'thickness',
    thickness: 'code'
};

interface RecordDraft {
    code: string;
    line: number;
    vp: number[];
    vs: number[];
    density: number[];
}

/**
 * Parse the first LAYER_COUNT values of a property line and convert them to
 * SI units. The line must carry at least `required` tokens and every kept
 * value must be finite.
 */
function scaledLayerValues(
    text: string,
    required: number,
    field: Exclude<RecordState, 'code'>,
    source: string,
    line: number
): number[] {
    const tokens = tokenize(text);
    if (tokens.length < required) {
        throw new ParseError(source, `${field} line needs ${required} values, found ${tokens.length}`, line);
    }
    return tokens.slice(0, CRUST2_LEGEND.LAYER_COUNT).map((token, layer) => {
        const value = parseNumber(token, source, line);
        if (!Number.isFinite(value)) {
            throw new ParseError(source, `${field} of the ${CRUST2_LAYER_NAMES[layer]} layer is "${token}", expected a finite number`, line);
        }
        return value * CRUST2_LEGEND.UNIT_SCALE;
    });
}

function freezeStack(draft: RecordDraft, thickness: number[]): LayerStack {
    return Object.freeze({
        vp: Object.freeze(draft.vp),
        vs: Object.freeze(draft.vs),
        density: Object.freeze(draft.density),
        thickness: Object.freeze(thickness)
    });
}

/**
 * Build the codec from the legend text. Throws ParseError when a record is
 * incomplete, a line is short, a kept value is not a finite number, a
 * thickness is negative, or a code appears twice.
 */
export function parseCodec(text: string, source: string = CRUST2_ARCHIVE.LEGEND_MEMBER): Codec {
    const codec = new Map<string, LayerStack>();
    let state: RecordState = 'code';
    let draft: RecordDraft | null = null;

    for (const { line, text: lineText } of contentLines(text, CRUST2_LEGEND.HEADER_LINES)) {
        if (state === 'code') {
            const trimmed = lineText.trim();
            if (trimmed.length < CRUST2_LEGEND.CODE_LENGTH) {
                throw new ParseError(source, `type code line "${trimmed}" is too short`, line);
            }
            const code = trimmed.slice(0, CRUST2_LEGEND.CODE_LENGTH);
            if (codec.has(code)) {
                throw new ParseError(source, `type code "${code}" is defined twice`, line);
            }
            draft = { code, line, vp: [], vs: [], density: [] };
        } else if (draft === null) {
            throw new ParseError(source, `${state} line outside a record`, line);
        } else if (state === 'thickness') {
            const thickness = scaledLayerValues(lineText, CRUST2_LEGEND.LAYER_COUNT, state, source, line);
            const negative = thickness.findIndex(value => value < 0);
            if (negative !== -1) {
                throw new ParseError(source, `${CRUST2_LAYER_NAMES[negative]} layer of "${draft.code}" has negative thickness`, line);
            }
            codec.set(draft.code, freezeStack(draft, thickness));
            draft = null;
        } else {
            draft[state] = scaledLayerValues(lineText, CRUST2_LEGEND.PROPERTY_FIELDS, state, source, line);
        }
        state = NEXT_STATE[state];
    }

    if (draft !== null) {
        throw new ParseError(
            source,
            `record "${draft.code}" ends before its ${state} line (line count is not a multiple of ${CRUST2_LEGEND.LINES_PER_RECORD})`,
            draft.line
        );
    }

    return codec;
}

export function loadCodec(archive: CrustArchive): Codec {
    const member = CRUST2_ARCHIVE.LEGEND_MEMBER;
    const codec = parseCodec(decodeText(archive.extract(member)), member);
    log.info(`Codec loaded: ${codec.size} type codes`);
    return codec;
}
