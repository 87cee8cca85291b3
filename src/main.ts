#!/usr/bin/env node
import { runCli } from './modules/cli.js';

runCli(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    (err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    }
);
