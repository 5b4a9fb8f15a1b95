import type { ForecastDatabase } from '../db';
import { WriteFailure, describeError } from '../errors';
import type { CountryRanking, ForecastSample, RankedCountry } from '../types';

/**
 * Inserts samples, replacing any row with the same
 * (forecast_date, cycle, lat, lon, forecast_hour) key so re-runs stay idempotent.
 * All rows are written in one transaction.
 */
export function upsertSamples(db: ForecastDatabase, samples: readonly ForecastSample[]): number {
    if (samples.length === 0) return 0;
    try {
        const insert = db.prepare(`
            INSERT OR REPLACE INTO gfs_forecasts
            (forecast_date, cycle, lat, lon, forecast_hour, wind_power_density)
            VALUES (@forecast_date, @cycle, @lat, @lon, @forecast_hour, @wind_power_density)
        `);
        const insertMany = db.transaction((rows: readonly ForecastSample[]) => {
            for (const row of rows) {
                insert.run(row);
            }
        });
        insertMany(samples);
    } catch (e) {
        const first = samples[0];
        throw new WriteFailure(`Failed to write ${samples.length} forecast samples: ${describeError(e)}`, {
            context: { forecast_date: first.forecast_date, cycle: first.cycle, forecast_hour: first.forecast_hour },
            cause: e,
        });
    }
    return samples.length;
}

/**
 * Replaces every ranking row of one cycle: delete-all then insert, in one
 * transaction. A failure rolls back to the previous set.
 */
export function replaceRankings(
    db: ForecastDatabase,
    date: string,
    cycle: string,
    rankings: readonly RankedCountry[]
): void {
    try {
        const remove = db.prepare('DELETE FROM country_rankings WHERE forecast_date = ? AND cycle = ?');
        const insert = db.prepare(`
            INSERT INTO country_rankings (forecast_date, cycle, country, avg_wind_power_density, rank)
            VALUES (@forecast_date, @cycle, @country, @avg_wind_power_density, @rank)
        `);
        const replace = db.transaction((rows: readonly RankedCountry[]) => {
            remove.run(date, cycle);
            for (const row of rows) {
                insert.run({ forecast_date: date, cycle, ...row });
            }
        });
        replace(rankings);
    } catch (e) {
        throw new WriteFailure(`Failed to replace rankings for ${date}/${cycle}: ${describeError(e)}`, {
            context: { forecast_date: date, cycle, rows: rankings.length },
            cause: e,
        });
    }
}

export function getSamples(db: ForecastDatabase, date: string, cycle: string, forecastHour?: number): ForecastSample[] {
    if (forecastHour === undefined) {
        return db.prepare<[string, string], ForecastSample>(`
            SELECT forecast_date, cycle, lat, lon, forecast_hour, wind_power_density
            FROM gfs_forecasts
            WHERE forecast_date = ? AND cycle = ?
            ORDER BY forecast_hour, lat, lon
        `).all(date, cycle);
    }
    return db.prepare<[string, string, number], ForecastSample>(`
        SELECT forecast_date, cycle, lat, lon, forecast_hour, wind_power_density
        FROM gfs_forecasts
        WHERE forecast_date = ? AND cycle = ? AND forecast_hour = ?
        ORDER BY lat, lon
    `).all(date, cycle, forecastHour);
}

export function countSamples(db: ForecastDatabase, date: string, cycle: string): number {
    const row = db.prepare<[string, string], { n: number }>(
        'SELECT COUNT(*) as n FROM gfs_forecasts WHERE forecast_date = ? AND cycle = ?'
    ).get(date, cycle);
    return row?.n ?? 0;
}

export function getRankings(db: ForecastDatabase, date: string, cycle: string): CountryRanking[] {
    return db.prepare<[string, string], CountryRanking>(`
        SELECT forecast_date, cycle, country, avg_wind_power_density, rank
        FROM country_rankings
        WHERE forecast_date = ? AND cycle = ?
        ORDER BY rank
    `).all(date, cycle);
}
