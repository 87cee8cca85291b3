// Archive Loader Module
// Opens the CRUST2.0 distribution archive and hands out member files by name.
// The model ships as .tar.gz; an already decompressed .tar is accepted too.
//
// The container type is detected from magic bytes. The gzip layer is removed
// with fflate gunzipSync(), then members are indexed in one pass over the tar
// buffer. Each extraction copies the member's bytes out of that buffer.

import { readFileSync } from 'fs';
import { gunzipSync } from 'fflate';
import { ArchiveError } from './errors.js';
import { Logger } from './logger.js';

const log = Logger.getLogger('ArchiveLoader');

export type ArchiveFormat = 'tar.gz' | 'tar';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

interface TarEntry {
    name: string;
    offset: number;
    size: number;
}

// =============================================================================
// MEMBER NAMES
// =============================================================================

/**
 * Canonical form used for lookups: forward slashes, no leading "./" or "/".
 * "./CNtype2.txt", "/CNtype2.txt" and "CNtype2.txt" all name the same member.
 */
export function normalizeMemberName(name: string): string {
    return name.replace(/\\/g, '/').replace(/^(\.\/|\/)+/, '');
}

// =============================================================================
// FORMAT DETECTION
// =============================================================================

const TAR_BLOCK = 512;

function isGzip(bytes: Uint8Array): boolean {
    return bytes.length >= 2 && bytes[0] === 0x1F && bytes[1] === 0x8B;
}

function readOctal(bytes: Uint8Array, start: number, length: number): number {
    let text = '';
    for (let i = start; i < start + length; i++) {
        const b = bytes[i];
        if (b === 0) break;
        text += String.fromCharCode(b);
    }
    text = text.trim();
    if (text === '') return 0;
    if (!/^[0-7]+$/.test(text)) return NaN;
    return parseInt(text, 8);
}

function readString(bytes: Uint8Array, start: number, length: number): string {
    let end = start;
    while (end < start + length && bytes[end] !== 0) end++;
    return new TextDecoder().decode(bytes.subarray(start, end));
}

function headerChecksumValid(block: Uint8Array): boolean {
    const stored = readOctal(block, 148, 8);
    if (Number.isNaN(stored)) return false;
    let sum = 0;
    for (let i = 0; i < TAR_BLOCK; i++) {
        // Checksum field counts as eight spaces
        sum += (i >= 148 && i < 156) ? 0x20 : block[i];
    }
    return sum === stored;
}

function isZeroBlock(block: Uint8Array): boolean {
    for (let i = 0; i < block.length; i++) {
        if (block[i] !== 0) return false;
    }
    return true;
}

/**
 * POSIX ustar headers carry "ustar\0" then version "00". GNU headers use
 * "ustar  \0" and keep access/change times where ustar keeps the name prefix.
 */
function isPosixUstar(header: Uint8Array): boolean {
    const magic = [0x75, 0x73, 0x74, 0x61, 0x72, 0x00, 0x30, 0x30];
    return magic.every((byte, i) => header[257 + i] === byte);
}

function isTar(bytes: Uint8Array): boolean {
    return bytes.length >= TAR_BLOCK && !isZeroBlock(bytes.subarray(0, TAR_BLOCK)) &&
        headerChecksumValid(bytes.subarray(0, TAR_BLOCK));
}

// =============================================================================
// TAR PARSING
// =============================================================================

/**
 * Pull the "path" record out of a pax extended header body.
 * Records look like "<len> path=<value>\n".
 */
function paxPath(body: Uint8Array): string | null {
    const text = new TextDecoder().decode(body);
    let pos = 0;
    while (pos < text.length) {
        const space = text.indexOf(' ', pos);
        if (space === -1) break;
        const len = parseInt(text.slice(pos, space), 10);
        if (!len || len <= 0) break;
        const record = text.slice(space + 1, pos + len - 1);
        if (record.startsWith('path=')) return record.slice(5);
        pos += len;
    }
    return null;
}

function indexTar(data: Uint8Array, label: string): Map<string, TarEntry> {
    const index = new Map<string, TarEntry>();
    let pos = 0;
    let pendingName: string | null = null;

    while (pos + TAR_BLOCK <= data.length) {
        const header = data.subarray(pos, pos + TAR_BLOCK);
        if (isZeroBlock(header)) break;

        if (!headerChecksumValid(header)) {
            throw new ArchiveError(`Invalid archive ${label}: bad tar header checksum at offset ${pos}`);
        }

        const size = readOctal(header, 124, 12);
        if (Number.isNaN(size)) {
            throw new ArchiveError(`Invalid archive ${label}: bad member size at offset ${pos}`);
        }
        const typeflag = String.fromCharCode(header[156]);
        const dataOffset = pos + TAR_BLOCK;
        if (dataOffset + size > data.length) {
            throw new ArchiveError(`Invalid archive ${label}: member at offset ${pos} is truncated`);
        }
        const body = data.subarray(dataOffset, dataOffset + size);

        let name = readString(header, 0, 100);
        if (isPosixUstar(header)) {
            const prefix = readString(header, 345, 155);
            if (prefix) name = `${prefix}/${name}`;
        }

        if (typeflag === 'L') {
            // GNU long name: the body holds the next member's name
            pendingName = readString(body, 0, body.length);
        } else if (typeflag === 'x') {
            pendingName = paxPath(body) ?? pendingName;
        } else if (typeflag === '0' || typeflag === '\0' || typeflag === '7') {
            const memberName = pendingName ?? name;
            pendingName = null;
            index.set(normalizeMemberName(memberName), {
                name: memberName,
                offset: dataOffset,
                size
            });
        } else {
            // Directories, links and other specials carry no data we need
            pendingName = null;
            log.debug(`Skipping tar entry "${name}" of type "${typeflag}"`);
        }

        pos = dataOffset + Math.ceil(size / TAR_BLOCK) * TAR_BLOCK;
    }

    return index;
}

// =============================================================================
// ARCHIVE
// =============================================================================

/**
 * A CRUST2.0 archive opened for member extraction.
 *
 * The whole archive is held in memory (the distribution is well under 1 MB
 * compressed) until close() is called. Each extract() returns a fresh copy
 * of the member's bytes.
 */
export class CrustArchive {
    readonly label: string;
    readonly format: ArchiveFormat;
    private _data: Uint8Array | null;
    private _index: Map<string, TarEntry>;

    private constructor(label: string, format: ArchiveFormat, data: Uint8Array, index: Map<string, TarEntry>) {
        this.label = label;
        this.format = format;
        this._data = data;
        this._index = index;
    }

    /**
     * Read and index the archive at `path`.
     */
    static open(path: string): CrustArchive {
        let bytes: Uint8Array;
        try {
            bytes = readFileSync(path);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ArchiveError(`Cannot open archive ${path}: ${reason}`, { cause: err });
        }
        return CrustArchive.fromBytes(bytes, path);
    }

    /**
     * Index an archive that is already in memory.
     */
    static fromBytes(bytes: Uint8Array, label = '<memory>'): CrustArchive {
        let archive: CrustArchive;
        if (isGzip(bytes)) {
            let tar: Uint8Array;
            try {
                tar = gunzipSync(bytes);
            } catch (err) {
                const reason = err instanceof Error ? err.message : String(err);
                throw new ArchiveError(`Invalid archive ${label}: gzip stream is corrupt (${reason})`, { cause: err });
            }
            if (!isTar(tar)) {
                throw new ArchiveError(`Invalid archive ${label}: gzip payload is not a tar archive`);
            }
            archive = new CrustArchive(label, 'tar.gz', tar, indexTar(tar, label));
        } else if (isTar(bytes)) {
            archive = new CrustArchive(label, 'tar', bytes, indexTar(bytes, label));
        } else {
            throw new ArchiveError(`Invalid archive ${label}: not a tar or tar.gz file`);
        }

        log.info(`Archive indexed: ${archive._index.size} members (${archive.format})`);
        return archive;
    }

    get closed(): boolean {
        return this._data === null;
    }

    /**
     * Member names as stored in the archive.
     */
    list(): string[] {
        return Array.from(this._index.values(), entry => entry.name);
    }

    has(name: string): boolean {
        return this._index.has(normalizeMemberName(name));
    }

    /**
     * Bytes of one member. Throws ArchiveError if the member is absent or the
     * archive has been closed.
     */
    extract(name: string): Uint8Array {
        const data = this._data;
        if (data === null) {
            throw new ArchiveError(`Archive ${this.label} is closed`);
        }

        const entry = this._index.get(normalizeMemberName(name));
        if (!entry) {
            throw new ArchiveError(`Archive ${this.label} has no member ${name}`);
        }

        return new Uint8Array(data.subarray(entry.offset, entry.offset + entry.size));
    }

    /**
     * Release the archive bytes. Safe to call more than once.
     */
    close(): void {
        if (this._data === null) return;
        this._data = null;
        log.debug(`Archive ${this.label} closed`);
    }
}
