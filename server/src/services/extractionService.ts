import { validateCycleRequest } from '../cycles';
import type { ForecastDatabase } from '../db';
import { PipelineError, SourceUnavailable, describeError } from '../errors';
import { log } from '../log';
import type { ForecastSample } from '../types';
import { upsertSamples } from './forecastStore';
import type { GridFrame, GridSource } from './gridSource';
import { windPowerDensity } from './windPower';

export function frameToSamples(date: string, cycle: string, frame: GridFrame): ForecastSample[] {
    return frame.points.map(p => ({
        forecast_date: date,
        cycle,
        lat: p.lat,
        lon: p.lon,
        forecast_hour: frame.forecastHour,
        wind_power_density: windPowerDensity(p.u, p.v),
    }));
}

/**
 * Pulls every forecast hour of a cycle from the grid source and upserts the
 * derived wind power density. Returns the number of rows written.
 *
 * Re-running a cycle replaces rows in place; hours written before a failure
 * stay in the store and are overwritten by the next attempt.
 */
export async function extract(db: ForecastDatabase, source: GridSource, date: string, cycle: string): Promise<number> {
    const target = validateCycleRequest(date, cycle);
    const label = `[EXTRACT] ${date}/${cycle}`;
    log(`${label}: starting`);
    console.time(label);

    let written = 0;
    let hours = 0;
    try {
        for await (const frame of source.fetchGrid(target.date, target.cycle)) {
            written += upsertSamples(db, frameToSamples(target.date, target.cycle, frame));
            hours++;
        }
    } catch (e) {
        if (e instanceof PipelineError) throw e;
        throw new SourceUnavailable(`Grid source failed for ${date}/${cycle}: ${describeError(e)}`, {
            context: { date, cycle },
            cause: e,
        });
    } finally {
        console.timeEnd(label);
    }

    if (written === 0) {
        throw new SourceUnavailable(`Grid source returned no data for ${date}/${cycle}`, { context: { date, cycle } });
    }
    log(`${label}: stored ${written} samples over ${hours} forecast hours`);
    return written;
}
