import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ParseError } from '../errors.js';
import { isBlank, linspace, loadSurfer, parseSurferAscii, parseSurferBinary } from '../surfer-grid.js';

const ASCII_GRID = [
    'DSAA',
    '3 2',
    '0 2',
    '0 1',
    '1 6',
    '1 2 3',
    '4 2e38 6',
    ''
].join('\n');

function binaryGrid(nx: number, ny: number, values: number[], limits = [0, 2, 0, 1, 1, 6]): Uint8Array {
    const bytes = new Uint8Array(56 + values.length * 4);
    const view = new DataView(bytes.buffer);
    'DSBB'.split('').forEach((c, i) => view.setUint8(i, c.charCodeAt(0)));
    view.setInt16(4, nx, true);
    view.setInt16(6, ny, true);
    limits.forEach((v, i) => view.setFloat64(8 + i * 8, v, true));
    values.forEach((v, i) => view.setFloat32(56 + i * 4, v, true));
    return bytes;
}

describe('linspace', () => {
    it('spaces values evenly, inclusive of both ends', () => {
        expect(linspace(0, 2, 3)).toEqual([0, 1, 2]);
        expect(linspace(10, 0, 5)).toEqual([10, 7.5, 5, 2.5, 0]);
    });

    it('returns the start for a single value', () => {
        expect(linspace(4, 9, 1)).toEqual([4]);
    });
});

describe('isBlank', () => {
    it('uses the Surfer blanking threshold inclusively', () => {
        expect(isBlank(1.70141e38)).toBe(true);
        expect(isBlank(2e38)).toBe(true);
        expect(isBlank(1.7014e38)).toBe(false);
    });
});

describe('parseSurferAscii', () => {
    it('builds axes from the header', () => {
        const { lon, lat } = parseSurferAscii(ASCII_GRID);
        expect(lon).toEqual([0, 1, 2]);
        expect(lat).toEqual([0, 1]);
    });

    it('replaces blanked values with NaN and keeps the rest', () => {
        const { grid } = parseSurferAscii(ASCII_GRID);
        expect(grid[0]).toEqual([1, 2, 3]);
        expect(grid[1][0]).toBe(4);
        expect(grid[1][1]).toBeNaN();
        expect(grid[1][2]).toBe(6);
    });

    it('reads a grid whose id is not DSAA', () => {
        const { grid } = parseSurferAscii(ASCII_GRID.replace('DSAA', 'GRID'));
        expect(grid[0]).toEqual([1, 2, 3]);
    });

    it('reads a grid whose id line is blank', () => {
        const { lon, grid } = parseSurferAscii(ASCII_GRID.replace('DSAA', ''));
        expect(lon).toEqual([0, 1, 2]);
        expect(grid[1][2]).toBe(6);
    });

    it('rejects a header line with the wrong number of values', () => {
        const text = ASCII_GRID.replace('0 1\n', '0 1 2\n');
        expect(() => parseSurferAscii(text, 'g.grd')).toThrow('g.grd:4: expected "ymin ymax" (2 values), found 3 values');
    });

    it('rejects a non-integer dimension', () => {
        const text = ASCII_GRID.replace('3 2\n', '3.5 2\n');
        expect(() => parseSurferAscii(text, 'g.grd')).toThrow('g.grd:2: nx must be a positive integer, got 3.5');
    });

    it('rejects a short header', () => {
        expect(() => parseSurferAscii('DSAA\n3 2\n', 'g.grd')).toThrow('g.grd: header needs 5 lines, found 2');
    });

    it('rejects a body with too few rows', () => {
        const text = ASCII_GRID.replace('4 2e38 6\n', '');
        expect(() => parseSurferAscii(text, 'g.grd')).toThrow('g.grd: expected 2 rows, found 1');
    });

    it('rejects a body row with the wrong column count', () => {
        const text = ASCII_GRID.replace('1 2 3', '1 2 3 4');
        expect(() => parseSurferAscii(text, 'g.grd')).toThrow('g.grd:6: expected 3 columns, found 4');
    });

    it('rejects a non-numeric body value', () => {
        expect(() => parseSurferAscii(ASCII_GRID.replace('1 2 3', '1 - 3'))).toThrow(ParseError);
    });
});

describe('parseSurferBinary', () => {
    it('reads DSBB grids', () => {
        const { lon, lat, grid } = parseSurferBinary(binaryGrid(3, 2, [1.5, -2, 0.25, 4, 2e38, 6]));
        expect(lon).toEqual([0, 1, 2]);
        expect(lat).toEqual([0, 1]);
        expect(grid[0]).toEqual([1.5, -2, 0.25]);
        expect(grid[1][0]).toBe(4);
        expect(grid[1][1]).toBeNaN();
        expect(grid[1][2]).toBe(6);
    });

    it('masks the float32 form of the blanking value', () => {
        const { grid } = parseSurferBinary(binaryGrid(1, 1, [1.70141e38], [0, 0, 0, 0, 0, 0]));
        expect(grid[0][0]).toBeNaN();
    });

    it('rejects another id', () => {
        const bytes = binaryGrid(3, 2, [1, 2, 3, 4, 5, 6]);
        bytes[3] = 'A'.charCodeAt(0);
        expect(() => parseSurferBinary(bytes, 'g.grd')).toThrow('g.grd: expected grid id "DSBB", found "DSBA"');
    });

    it('rejects truncated data', () => {
        const bytes = binaryGrid(3, 2, [1, 2, 3, 4, 5]);
        expect(() => parseSurferBinary(bytes, 'g.grd'))
            .toThrow('g.grd: expected 80 bytes for a 3 x 2 grid, found 76');
    });

    it('rejects a header shorter than 56 bytes', () => {
        expect(() => parseSurferBinary(new Uint8Array(20), 'g.grd')).toThrow('g.grd: header needs 56 bytes, found 20');
    });
});

describe('loadSurfer', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'surfer-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('reads ASCII grids by default', () => {
        const path = join(dir, 'ascii.grd');
        writeFileSync(path, ASCII_GRID);
        const { lon, lat, grid } = loadSurfer(path);
        expect(lon).toHaveLength(3);
        expect(lat).toHaveLength(2);
        expect(grid[1][1]).toBeNaN();
    });

    it('reads binary grids on request', () => {
        const path = join(dir, 'binary.grd');
        writeFileSync(path, binaryGrid(3, 2, [1, 2, 3, 4, 5, 6]));
        expect(loadSurfer(path, 'binary').grid).toEqual([[1, 2, 3], [4, 5, 6]]);
    });
});
