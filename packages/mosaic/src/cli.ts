#!/usr/bin/env node
/**
 * tesserae - audio mosaicing from the command line.
 *
 * Usage:
 *   tesserae [analyze|mosaic|all] --target groove.wav --manifest dataframe.csv
 *   tesserae mosaic --policy best --out rebuilt.wav
 *
 * Environment variables (MOSAIC_*, optionally from .env) supply defaults;
 * flags override them.
 */

import { HELP, parseArgs, type CliArgs } from "./cliArgs";
import { loadConfig, loadDotenv } from "./config";
import { errorMessage } from "./errors";
import { runMosaic } from "./runner/runMosaic";
import { createLogger } from "./util/log";

async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    } catch (err) {
        console.error(errorMessage(err));
        console.error(HELP);
        return 1;
    }

    if (args.help) {
        console.log(HELP);
        return 0;
    }

    loadDotenv();

    try {
        const config = loadConfig(process.env, args.overrides);
        const logger = createLogger("Mosaic", config.logLevel);
        const report = await runMosaic(args.step, config, { logger });

        if (report.skipped.length > 0) {
            logger.warn(`${report.skipped.length} source file(s) could not be analysed and were skipped`);
        }
        for (const entry of report.usedSources) {
            logger.info(`  ${entry.collectionId}  ${entry.path}  ${JSON.stringify(entry.metadata)}`);
        }
        return 0;
    } catch (err) {
        console.error(`[Mosaic] ${errorMessage(err)}`);
        return 1;
    }
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    }
);
