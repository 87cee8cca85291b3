/**
 * Command-line front end.
 *
 *   crust2 fetch [dest] [--url <url>]
 *   crust2 convert <archive>
 *   crust2 surfer <file> [--binary]
 *
 * Global flag: --log-level <debug|info|warn|error|none>
 */

import { parseArgs } from 'util';
import { CRUST2_ARCHIVE } from './constants.js';
import { fetchCrust2 } from './crust-fetch.js';
import { crust2ToTesseroids, summarizeModel } from './crust-model.js';
import { Logger } from './logger.js';
import { loadSurfer, type SurferGrid } from './surfer-grid.js';

const log = Logger.getLogger('cli');

export const USAGE = [
    'Usage:',
    '  crust2 fetch [dest] [--url <url>]',
    '  crust2 convert <archive>',
    '  crust2 surfer <file> [--binary]',
    '',
    'Options:',
    '  --log-level <debug|info|warn|error|none>'
].join('\n');

/** Where command output goes; swapped out in tests. */
export interface CliIO {
    out(text: string): void;
    err(text: string): void;
}

const consoleIO: CliIO = {
    out: text => process.stdout.write(text + '\n'),
    err: text => process.stderr.write(text + '\n')
};

export interface SurferSummary {
    nx: number;
    ny: number;
    lon: [number, number];
    lat: [number, number];
    blank: number;
}

export function summarizeSurfer({ lon, lat, grid }: SurferGrid): SurferSummary {
    let blank = 0;
    for (const row of grid) {
        for (const value of row) {
            if (Number.isNaN(value)) blank++;
        }
    }
    return {
        nx: lon.length,
        ny: lat.length,
        lon: [lon[0], lon[lon.length - 1]],
        lat: [lat[0], lat[lat.length - 1]],
        blank
    };
}

function parseCliArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'log-level': { type: 'string' },
            url: { type: 'string' },
            binary: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });
}

/**
 * Run one command. Resolves to the process exit code; errors are reported on
 * `io.err` rather than thrown.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(argv);
    } catch (err) {
        io.err(err instanceof Error ? err.message : String(err));
        io.err(USAGE);
        return 2;
    }

    const { values, positionals } = parsed;
    const [command, target] = positionals;

    if (values.help || !command) {
        io.out(USAGE);
        return command || values.help ? 0 : 2;
    }

    const levelFlag = values['log-level'];
    if (levelFlag !== undefined) {
        const level = Logger.parseLevel(levelFlag);
        if (level === null) {
            io.err(`Unknown log level "${levelFlag}"`);
            return 2;
        }
        Logger.setLevel(level);
    }

    try {
        switch (command) {
            case 'fetch': {
                const dest = await fetchCrust2(target ?? CRUST2_ARCHIVE.DEFAULT_FILENAME, { url: values.url });
                io.out(dest);
                return 0;
            }
            case 'convert': {
                if (!target) {
                    io.err('convert: missing archive path');
                    return 2;
                }
                const model = crust2ToTesseroids(target);
                io.out(JSON.stringify(summarizeModel(model), null, 2));
                return 0;
            }
            case 'surfer': {
                if (!target) {
                    io.err('surfer: missing grid file path');
                    return 2;
                }
                const grid = loadSurfer(target, values.binary ? 'binary' : 'ascii');
                io.out(JSON.stringify(summarizeSurfer(grid), null, 2));
                return 0;
            }
            default:
                io.err(`Unknown command "${command}"`);
                io.err(USAGE);
                return 2;
        }
    } catch (err) {
        log.debug('Command failed:', err);
        io.err(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
        return 1;
    }
}
