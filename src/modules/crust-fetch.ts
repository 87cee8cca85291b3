/**
 * CRUST2.0 Archive Fetcher
 *
 * Downloads the model archive and saves it to disk. Network and write
 * failures reach the caller as thrown by fetch() and fs; a non-2xx response
 * becomes a FetchError. Nothing is retried.
 */

import { writeFile } from 'fs/promises';
import { CRUST2_ARCHIVE } from './constants.js';
import { FetchError } from './errors.js';
import { Logger } from './logger.js';

const log = Logger.getLogger('CrustFetch');

export interface FetchOptions {
    /** Download location, defaults to the published CRUST2.0 archive */
    url?: string;
    /** Called with the fraction received when content-length is known */
    onProgress?: (fraction: number) => void;
}

async function readBody(response: Response, onProgress?: (fraction: number) => void): Promise<Uint8Array> {
    const contentLength = parseInt(response.headers.get('content-length') || '0', 10);

    if (!onProgress || !contentLength || !response.body) {
        return new Uint8Array(await response.arrayBuffer());
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let receivedLength = 0;

    while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        chunks.push(value);
        receivedLength += value.length;
        onProgress(receivedLength / contentLength);
    }

    const data = new Uint8Array(receivedLength);
    let position = 0;
    for (const chunk of chunks) {
        data.set(chunk, position);
        position += chunk.length;
    }
    return data;
}

/**
 * Download the CRUST2.0 archive to `dest`.
 *
 * @returns the path the archive was written to
 */
export async function fetchCrust2(
    dest: string = CRUST2_ARCHIVE.DEFAULT_FILENAME,
    options: FetchOptions = {}
): Promise<string> {
    const { url = CRUST2_ARCHIVE.URL, onProgress } = options;

    log.info(`Downloading ${url}`);
    const response = await fetch(url);
    if (!response.ok) {
        throw new FetchError(url, response.status, response.statusText);
    }

    const data = await readBody(response, onProgress);
    await writeFile(dest, data);
    log.info(`Saved ${data.length} bytes to ${dest}`);
    return dest;
}
