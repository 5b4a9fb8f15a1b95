#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'fs';
import { parseArgs } from 'util';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { validateCycleRequest } from './cycles';
import { openDatabase, type ForecastDatabase } from './db';
import { describeError } from './errors';
import { log, logError } from './log';
import { aggregate } from './services/aggregationService';
import { ensureCountryDataset, loadCountryPolygons } from './services/countryService';
import { CycleScheduler } from './services/cycleScheduler';
import { extract } from './services/extractionService';
import { OpenMeteoGridSource } from './services/gridSource';
import { PngMapRenderer } from './services/mapRenderer';
import type { CountryPolygon } from './types';

const USAGE = `Usage: wpd <mode> [options]

Modes:
  scheduler                                   run extract + aggregate on the cron schedule
  manual --date YYYYMMDD --cycle 00|06|12|18  run one cycle and exit
  serve [--port N]                            serve the API and the viewer
  setup                                       create directories and schema, download country boundaries
`;

class UsageError extends Error {}

function createScheduler(config: AppConfig, db: ForecastDatabase) {
    const source = new OpenMeteoGridSource(config.grid, { baseUrl: config.openMeteoUrl });
    let countries: CountryPolygon[] | null = null;
    const deps = {
        db,
        countries: () => (countries ??= loadCountryPolygons(config.countriesPath, { continent: config.countryContinent })),
        renderer: new PngMapRenderer(),
        plotsDir: config.plotsDir,
        gridResolution: config.grid.resolution,
    };
    return new CycleScheduler({
        extract: (date, cycle) => extract(db, source, date, cycle),
        aggregate: (date, cycle) => aggregate(deps, date, cycle),
        cronExpression: config.scheduleCron,
        timezone: config.scheduleTimezone,
        runOnStart: config.runOnStart,
    });
}

function onShutdown(handler: () => Promise<void>) {
    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) return;
        stopping = true;
        log(`[SERVER] ${signal} received, shutting down...`);
        handler()
            .then(() => process.exit(0))
            .catch(err => {
                logError(`[SERVER] Shutdown failed: ${describeError(err)}`);
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function runSetup(config: AppConfig) {
    fs.mkdirSync(config.plotsDir, { recursive: true });
    openDatabase(config.databasePath).close();
    await ensureCountryDataset(config.countriesPath, config.countriesUrl);
    log('[SETUP] Done.');
}

async function runManual(config: AppConfig, date: string | undefined, cycle: string | undefined): Promise<number> {
    if (!date || !cycle) throw new UsageError('manual mode needs --date and --cycle');
    const target = validateCycleRequest(date, cycle);
    const db = openDatabase(config.databasePath);
    try {
        const result = await createScheduler(config, db).run(target);
        return result.state === 'FAILED' ? 1 : 0;
    } finally {
        db.close();
    }
}

function runScheduler(config: AppConfig) {
    const db = openDatabase(config.databasePath);
    const scheduler = createScheduler(config, db);
    scheduler.start();
    onShutdown(async () => {
        await scheduler.stop();
        db.close();
    });
}

function runServe(config: AppConfig, portArg: string | undefined) {
    const port = portArg === undefined ? config.port : Number(portArg);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) throw new UsageError(`Invalid port "${portArg}"`);

    const db = openDatabase(config.databasePath);
    const app = createApp({ db, plotsDir: config.plotsDir, staticDir: config.staticDir });
    const server = app.listen(port, () => {
        log(`[SERVER] Running on http://localhost:${port}`);
    });
    onShutdown(
        () =>
            new Promise<void>((resolve, reject) => {
                server.close(err => {
                    db.close();
                    if (err) reject(err);
                    else resolve();
                });
            })
    );
}

async function main(argv: string[]): Promise<number> {
    const { positionals, values } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            date: { type: 'string' },
            cycle: { type: 'string' },
            port: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });
    const mode = positionals[0];
    if (values.help || !mode) {
        process.stdout.write(USAGE);
        return mode ? 0 : 1;
    }

    dotenv.config();
    const config = loadConfig();

    switch (mode) {
        case 'setup':
            await runSetup(config);
            return 0;
        case 'manual':
            return runManual(config, values.date, values.cycle);
        case 'scheduler':
            runScheduler(config);
            return 0;
        case 'serve':
            runServe(config, values.port);
            return 0;
        default:
            throw new UsageError(`Unknown mode "${mode}"`);
    }
}

main(process.argv.slice(2))
    .then(code => {
        if (code !== 0) process.exitCode = code;
    })
    .catch(err => {
        logError(`[CLI] ${describeError(err)}`);
        if (err instanceof UsageError || (err instanceof Error && 'code' in err && err.code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION')) {
            process.stderr.write(USAGE);
        }
        process.exitCode = 1;
    });
