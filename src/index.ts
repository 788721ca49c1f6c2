#!/usr/bin/env node
import { handleHelpCli, runHostHealthCli } from './core/cli.js';

const argv = process.argv.slice(2);

if (!handleHelpCli(argv)) {
    try {
        await runHostHealthCli(argv);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[HostHealth] Unexpected failure: ${message}`);
        process.exitCode = 1;
    }
}
