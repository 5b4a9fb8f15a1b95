import { z } from 'zod';
import type { GridSpec } from '../config';
import { FORECAST_HOURS, WIND_DIRECTION_VAR, WIND_SPEED_VAR } from '../constants';
import { cycleRunTime } from '../cycles';
import { SourceUnavailable, describeError } from '../errors';
import { fetchWithRetry } from '../http';
import { log } from '../log';
import type { Cycle } from '../types';
import { windComponents } from './windPower';

export interface GridPoint {
    lat: number;
    lon: number;
    u: number | null; // m/s, eastward
    v: number | null; // m/s, northward
}

/**
 * All grid points of one forecast hour.
 */
export interface GridFrame {
    forecastHour: number;
    points: GridPoint[];
}

/**
 * Provider of gridded hub-height wind for a cycle. Frames come in ascending
 * forecast-hour order. Implementations throw SourceUnavailable when the cycle
 * cannot be read.
 */
export interface GridSource {
    fetchGrid(date: string, cycle: Cycle): AsyncIterable<GridFrame>;
}

const seriesSchema = z.array(z.number().nullable());

const locationSchema = z.object({
    hourly: z.object({
        time: z.array(z.number()),
        [WIND_SPEED_VAR]: seriesSchema,
        [WIND_DIRECTION_VAR]: seriesSchema,
    }),
});

// One location returns an object, several return an array in request order
const responseSchema = z.union([z.array(locationSchema), locationSchema.transform(loc => [loc])]);

type LocationSeries = z.infer<typeof locationSchema>;

const round = (n: number) => Math.round(n * 1e4) / 1e4;

/**
 * Inclusive lattice from min to max in `step` increments.
 */
export function gridAxis(min: number, max: number, step: number): number[] {
    const values: number[] = [];
    for (let i = 0; min + i * step <= max + 1e-9; i++) {
        values.push(round(min + i * step));
    }
    return values;
}

export function gridLattice(spec: GridSpec): { lat: number; lon: number }[] {
    const lats = gridAxis(spec.latMin, spec.latMax, spec.resolution);
    const lons = gridAxis(spec.lonMin, spec.lonMax, spec.resolution);
    return lats.flatMap(lat => lons.map(lon => ({ lat, lon })));
}

const isoHour = (ms: number) => new Date(ms).toISOString().slice(0, 16);

export interface OpenMeteoOptions {
    baseUrl: string;
    chunkSize?: number;
    retries?: number;
    retryDelay?: number;
}

/**
 * GFS 100 m wind from the Open-Meteo forecast API, sampled on a regular
 * lattice. Speed and direction are converted to u/v so downstream code only
 * sees components. Locations are requested in chunks; every chunk must
 * succeed before the first frame is yielded.
 */
export class OpenMeteoGridSource implements GridSource {
    private readonly chunkSize: number;
    private readonly retries: number;
    private readonly retryDelay: number;

    constructor(private readonly grid: GridSpec, private readonly options: OpenMeteoOptions) {
        this.chunkSize = options.chunkSize ?? 50;
        this.retries = options.retries ?? 3;
        this.retryDelay = options.retryDelay ?? 1000;
    }

    buildUrl(points: readonly { lat: number; lon: number }[], runTime: number): string {
        const lastHour = FORECAST_HOURS[FORECAST_HOURS.length - 1];
        const params = new URLSearchParams({
            latitude: points.map(p => p.lat).join(','),
            longitude: points.map(p => p.lon).join(','),
            hourly: `${WIND_SPEED_VAR},${WIND_DIRECTION_VAR}`,
            wind_speed_unit: 'ms',
            timezone: 'GMT',
            timeformat: 'unixtime',
            start_hour: isoHour(runTime),
            end_hour: isoHour(runTime + lastHour * 3600000),
        });
        return `${this.options.baseUrl}?${params.toString()}`;
    }

    private async fetchChunk(points: readonly { lat: number; lon: number }[], runTime: number): Promise<LocationSeries[]> {
        const url = this.buildUrl(points, runTime);
        let json: unknown;
        try {
            const res = await fetchWithRetry(url, this.retries, this.retryDelay);
            if (!res.ok) throw new Error(`HTTP ${res.status}`);
            json = await res.json();
        } catch (e) {
            throw new SourceUnavailable(`Grid request failed: ${describeError(e)}`, { context: { url }, cause: e });
        }
        const parsed = responseSchema.safeParse(json);
        if (!parsed.success) {
            throw new SourceUnavailable(`Unexpected grid response: ${parsed.error.issues[0]?.message}`, { context: { url } });
        }
        if (parsed.data.length !== points.length) {
            throw new SourceUnavailable(`Grid response has ${parsed.data.length} locations, expected ${points.length}`, {
                context: { url },
            });
        }
        return parsed.data;
    }

    async *fetchGrid(date: string, cycle: Cycle): AsyncGenerator<GridFrame> {
        const runTime = cycleRunTime({ date, cycle });
        const lattice = gridLattice(this.grid);
        const wanted = new Set(FORECAST_HOURS);
        const frames = new Map<number, GridPoint[]>();

        for (let start = 0; start < lattice.length; start += this.chunkSize) {
            const chunk = lattice.slice(start, start + this.chunkSize);
            const series = await this.fetchChunk(chunk, runTime);
            log(`[GRID] ${date}/${cycle}: fetched ${Math.min(start + chunk.length, lattice.length)}/${lattice.length} points`);

            chunk.forEach((point, i) => {
                const { hourly } = series[i];
                hourly.time.forEach((t, k) => {
                    const hour = Math.round((t * 1000 - runTime) / 3600000);
                    if (!wanted.has(hour)) return;
                    const { u, v } = windComponents(hourly[WIND_SPEED_VAR][k], hourly[WIND_DIRECTION_VAR][k]);
                    let bucket = frames.get(hour);
                    if (!bucket) {
                        bucket = [];
                        frames.set(hour, bucket);
                    }
                    // Requested coordinates, not the model cell Open-Meteo snapped to
                    bucket.push({ lat: point.lat, lon: point.lon, u, v });
                });
            });
        }

        if (frames.size === 0) {
            throw new SourceUnavailable(`No forecast hours available for ${date}/${cycle}`, { context: { date, cycle } });
        }
        for (const hour of [...frames.keys()].sort((a, b) => a - b)) {
            yield { forecastHour: hour, points: frames.get(hour) ?? [] };
        }
    }
}
