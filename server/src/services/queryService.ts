import type { ForecastDatabase } from '../db';
import { isCycle } from '../cycles';
import type { CountryRanking, ForecastCycle, ForecastSample, HourlyAverage } from '../types';
import { averageBy } from './averaging';
import * as store from './forecastStore';

// Read-only views over the store for the HTTP layer.

export function listDates(db: ForecastDatabase): string[] {
    return db
        .prepare<[], { forecast_date: string }>('SELECT DISTINCT forecast_date FROM gfs_forecasts ORDER BY forecast_date DESC')
        .all()
        .map(r => r.forecast_date);
}

export function listCycles(db: ForecastDatabase, date: string): string[] {
    return db
        .prepare<[string], { cycle: string }>('SELECT DISTINCT cycle FROM gfs_forecasts WHERE forecast_date = ? ORDER BY cycle')
        .all(date)
        .map(r => r.cycle);
}

export function listForecastHours(db: ForecastDatabase, date: string, cycle: string): number[] {
    return db
        .prepare<[string, string], { forecast_hour: number }>(
            'SELECT DISTINCT forecast_hour FROM gfs_forecasts WHERE forecast_date = ? AND cycle = ? ORDER BY forecast_hour'
        )
        .all(date, cycle)
        .map(r => r.forecast_hour);
}

export function getSamples(db: ForecastDatabase, date: string, cycle: string, forecastHour?: number): ForecastSample[] {
    return store.getSamples(db, date, cycle, forecastHour);
}

export function getRanking(db: ForecastDatabase, date: string, cycle: string): CountryRanking[] {
    return store.getRankings(db, date, cycle);
}

/**
 * Mean wind power density per forecast hour, nulls ignored, ascending hour.
 */
export function hourlyAverages(samples: readonly ForecastSample[]): HourlyAverage[] {
    return [...averageBy(samples, s => s.forecast_hour, s => s.wind_power_density)]
        .map(([forecast_hour, { mean, count }]) => ({
            forecast_hour,
            avg_wind_power_density: mean,
            sample_count: count,
        }))
        .sort((a, b) => a.forecast_hour - b.forecast_hour);
}

export function getHourlyAverages(db: ForecastDatabase, date: string, cycle: string): HourlyAverage[] {
    return hourlyAverages(store.getSamples(db, date, cycle));
}

export function getLatestCycle(db: ForecastDatabase): ForecastCycle | null {
    const row = db
        .prepare<[], { forecast_date: string; cycle: string }>(
            'SELECT forecast_date, cycle FROM gfs_forecasts ORDER BY forecast_date DESC, cycle DESC LIMIT 1'
        )
        .get();
    if (!row || !isCycle(row.cycle)) return null;
    return { date: row.forecast_date, cycle: row.cycle };
}
