/**
 * In-memory builders for the archives and text layouts the loaders read.
 */
import { gzipSync, strToU8 } from 'fflate';

export interface TarMember {
    name: string;
    content?: string | Uint8Array;
    /** tar typeflag, '0' for a regular file, '5' for a directory */
    type?: string;
    header?: TarHeaderOptions;
}

export interface TarHeaderOptions {
    /** Text written to bytes 345-499 (ustar name prefix, GNU atime/ctime) */
    prefix?: string;
    /** Write the GNU "ustar  \0" magic instead of POSIX "ustar\0" "00" */
    gnu?: boolean;
}

function writeAscii(block: Uint8Array, offset: number, text: string): void {
    for (let i = 0; i < text.length; i++) {
        block[offset + i] = text.charCodeAt(i);
    }
}

function octal(value: number, width: number): string {
    return value.toString(8).padStart(width - 1, '0') + '\0';
}

function toBytes(content: string | Uint8Array | undefined): Uint8Array {
    if (content === undefined) return new Uint8Array(0);
    return typeof content === 'string' ? strToU8(content) : content;
}

export function tarHeader(name: string, size: number, type = '0', options: TarHeaderOptions = {}): Uint8Array {
    const header = new Uint8Array(512);
    writeAscii(header, 0, name);
    writeAscii(header, 100, octal(0o644, 8));
    writeAscii(header, 108, octal(0, 8));
    writeAscii(header, 116, octal(0, 8));
    writeAscii(header, 124, octal(size, 12));
    writeAscii(header, 136, octal(0, 12));
    writeAscii(header, 148, '        ');
    writeAscii(header, 156, type);
    if (options.gnu) {
        writeAscii(header, 257, 'ustar  \0');
    } else {
        writeAscii(header, 257, 'ustar\0');
        writeAscii(header, 263, '00');
    }
    if (options.prefix) writeAscii(header, 345, options.prefix);

    let sum = 0;
    for (const b of header) sum += b;
    writeAscii(header, 148, sum.toString(8).padStart(6, '0') + '\0 ');
    return header;
}

export function makeTar(members: TarMember[]): Uint8Array {
    const blocks: Uint8Array[] = [];
    for (const member of members) {
        const data = toBytes(member.content);
        blocks.push(tarHeader(member.name, data.length, member.type ?? '0', member.header));
        const padded = new Uint8Array(Math.ceil(data.length / 512) * 512);
        padded.set(data);
        blocks.push(padded);
    }
    blocks.push(new Uint8Array(1024));

    const total = blocks.reduce((n, b) => n + b.length, 0);
    const tar = new Uint8Array(total);
    let pos = 0;
    for (const block of blocks) {
        tar.set(block, pos);
        pos += block.length;
    }
    return tar;
}

export function makeTarGz(members: TarMember[]): Uint8Array {
    return gzipSync(makeTar(members));
}

// =============================================================================
// CRUST2.0 TEXT LAYOUTS
// =============================================================================

const GRID_ROWS = 90;
const GRID_COLS = 180;

function gridText(cell: (row: number, col: number) => string): string {
    const header = ['#', ...Array.from({ length: GRID_COLS }, (_, j) => String(-179 + 2 * j))].join(' ');
    const rows = Array.from({ length: GRID_ROWS }, (_, i) => {
        const label = String(89 - 2 * i);
        const values = Array.from({ length: GRID_COLS }, (_, j) => cell(i, j));
        return [label, ...values].join(' ');
    });
    return [header, ...rows].join('\n') + '\n';
}

export function topographyText(elevation: (row: number, col: number) => number): string {
    return gridText((i, j) => String(elevation(i, j)));
}

export function typesText(code: (row: number, col: number) => string): string {
    return gridText(code);
}

export interface LegendRecord {
    code: string;
    description?: string;
    vp: Array<number | string>;
    vs: Array<number | string>;
    density: Array<number | string>;
    thickness: Array<number | string>;
}

export const LEGEND_HEADER = [
    'Key to the crustal types',
    '',
    'layers: ice, water, soft sed, hard sed, upper, middle, lower crust, mantle',
    'units: km/s, km/s, g/cm3, km',
    '-----'
];

export function legendText(records: LegendRecord[]): string {
    const lines = [...LEGEND_HEADER];
    for (const record of records) {
        lines.push(`${record.code} ${record.description ?? 'test profile'}`);
        lines.push(record.vp.join(' '));
        lines.push(record.vs.join(' '));
        lines.push(record.density.join(' '));
        lines.push(record.thickness.join(' '));
    }
    return lines.join('\n') + '\n';
}

/** Ocean-like profile: 4 km of water, 1 km soft sediments, 6.5 km of crust. */
export const OCEAN_RECORD: LegendRecord = {
    code: 'A1',
    description: 'Oceanic',
    vp: [3.81, 1.5, 2.0, 4.5, 5.0, 6.5, 7.0, 8.1],
    vs: [1.94, 0, 1.0, 2.5, 2.8, 3.5, 3.8, 4.5],
    density: [0.92, 1.02, 2.0, 2.5, 2.6, 2.9, 3.05, 3.3],
    thickness: [0, 4, 1, 0, 0, 6.5, 0, 'inf']
};

/** Continental profile without ice or water. */
export const CONTINENT_RECORD: LegendRecord = {
    code: 'B1',
    description: 'Platform',
    vp: [3.81, 1.5, 2.5, 4.0, 6.0, 6.5, 7.0, 8.0],
    vs: [1.94, 0, 1.2, 2.1, 3.5, 3.75, 4.0, 4.5],
    density: [0.92, 1.02, 2.1, 2.4, 2.75, 2.875, 3.0, 3.25],
    thickness: [0, 0, 0.5, 1.5, 10, 10, 10, 'inf']
};

export interface CrustMembers {
    topography?: string;
    types?: string;
    legend?: string;
}

/**
 * A CRUST2.0-shaped archive: ocean (A1) in the northern hemisphere at -4000 m,
 * continent (B1) in the southern hemisphere at 500 m.
 */
export function defaultCrustMembers(): Required<CrustMembers> {
    return {
        topography: topographyText(row => (row < 45 ? -4000 : 500)),
        types: typesText(row => (row < 45 ? 'A1' : 'B1')),
        legend: legendText([OCEAN_RECORD, CONTINENT_RECORD])
    };
}

export function makeCrustArchive(members: CrustMembers = defaultCrustMembers()): Uint8Array {
    const tarMembers: TarMember[] = [{ name: './', type: '5' }];
    if (members.topography !== undefined) tarMembers.push({ name: './CNelevatio2.txt', content: members.topography });
    if (members.types !== undefined) tarMembers.push({ name: './CNtype2.txt', content: members.types });
    if (members.legend !== undefined) tarMembers.push({ name: './CNtype2_key.txt', content: members.legend });
    return makeTarGz(tarMembers);
}
