import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CYCLES } from './constants';
import { parseForecastDate } from './cycles';
import type { ForecastDatabase } from './db';
import { NoDataFound, PipelineError, StaleConfiguration } from './errors';
import { logError } from './log';
import { countSamples } from './services/forecastStore';
import * as queryService from './services/queryService';

export interface AppOptions {
    db: ForecastDatabase;
    plotsDir: string;
    staticDir: string;
}

const dateParam = z
    .string()
    .refine(d => parseForecastDate(d) !== null, 'date must be a valid YYYYMMDD calendar date');

const cycleParams = z.object({
    date: dateParam,
    cycle: z.enum(CYCLES),
});

const hourQuery = z.object({
    hour: z
        .string()
        .regex(/^\d+$/, 'hour must be a non-negative integer')
        .transform(Number)
        .optional(),
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        const message = result.error.issues.map(i => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
        throw new StaleConfiguration(message);
    }
    return result.data;
}

// Per-cycle routes 404 for cycles that were never extracted
function requireCycle(db: ForecastDatabase, params: unknown) {
    const { date, cycle } = parse(cycleParams, params);
    if (countSamples(db, date, cycle) === 0) {
        throw new NoDataFound(`No forecast stored for ${date}/${cycle}`, { context: { date, cycle } });
    }
    return { date, cycle };
}

const STATUS_BY_KIND = {
    StaleConfiguration: 400,
    NoDataFound: 404,
    SourceUnavailable: 502,
    WriteFailure: 503,
} as const;

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
    if (err instanceof PipelineError) {
        const status = STATUS_BY_KIND[err.kind];
        if (status >= 500) logError(`[SERVER] ${req.method} ${req.path}: ${err.toLogFormat()}`);
        res.status(status).json({ error: { type: err.kind, message: err.message } });
        return;
    }
    logError(`[SERVER] ${req.method} ${req.path}: ${err.stack ?? err.message}`);
    res.status(500).json({ error: { type: 'InternalError', message: 'Internal server error' } });
}

/**
 * Read-only HTTP API over the forecast store, plus the rendered artifacts and
 * the built viewer.
 */
export function createApp({ db, plotsDir, staticDir }: AppOptions) {
    const app = express();
    app.use(cors());

    app.get('/api/status', (req, res) => {
        res.json({
            status: 'online',
            latest: queryService.getLatestCycle(db),
            server_time: Date.now(),
        });
    });

    app.get('/api/dates', (req, res) => {
        res.json(queryService.listDates(db));
    });

    app.get('/api/dates/:date/cycles', (req, res) => {
        const date = parse(dateParam, req.params.date);
        res.json(queryService.listCycles(db, date));
    });

    app.get('/api/forecasts/:date/:cycle/hours', (req, res) => {
        const { date, cycle } = requireCycle(db, req.params);
        res.json(queryService.listForecastHours(db, date, cycle));
    });

    app.get('/api/forecasts/:date/:cycle/samples', (req, res) => {
        const { date, cycle } = requireCycle(db, req.params);
        const { hour } = parse(hourQuery, req.query);
        res.json(queryService.getSamples(db, date, cycle, hour));
    });

    app.get('/api/forecasts/:date/:cycle/rankings', (req, res) => {
        const { date, cycle } = requireCycle(db, req.params);
        res.json(queryService.getRanking(db, date, cycle));
    });

    app.get('/api/forecasts/:date/:cycle/hourly-average', (req, res) => {
        const { date, cycle } = requireCycle(db, req.params);
        res.json(queryService.getHourlyAverages(db, date, cycle));
    });

    app.use('/api', (req, res) => {
        res.status(404).json({ error: { type: 'NotFound', message: `No route for ${req.method} ${req.originalUrl}` } });
    });

    app.use('/plots', express.static(plotsDir));

    // Viewer build (vite) with SPA fallback, when it has been built
    const indexHtml = path.join(staticDir, 'index.html');
    if (fs.existsSync(indexHtml)) {
        app.use(express.static(staticDir));
        app.get(/(.*)/, (req, res) => {
            res.sendFile(path.resolve(indexHtml));
        });
    }

    app.use(errorHandler);
    return app;
}
