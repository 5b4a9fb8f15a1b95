import type { MultiPolygon, Polygon } from 'geojson';
import type { CYCLES } from './constants';

export type Cycle = typeof CYCLES[number];

/**
 * Logical forecast run identifier. Never stored as its own row; derived from
 * the distinct (forecast_date, cycle) pairs in gfs_forecasts.
 */
export interface ForecastCycle {
    date: string; // YYYYMMDD
    cycle: Cycle;
}

/**
 * One row of gfs_forecasts. Keyed by (forecast_date, cycle, lat, lon, forecast_hour).
 */
export interface ForecastSample {
    forecast_date: string;
    cycle: string;
    lat: number;
    lon: number;
    forecast_hour: number;
    wind_power_density: number | null;
}

export interface RankedCountry {
    country: string;
    avg_wind_power_density: number;
    rank: number;
}

/**
 * One row of country_rankings.
 */
export interface CountryRanking extends RankedCountry {
    forecast_date: string;
    cycle: string;
}

export interface HourlyAverage {
    forecast_hour: number;
    avg_wind_power_density: number | null;
    sample_count: number;
}

/**
 * Regular lat/lon lattice of averaged wind power density.
 * values[latIndex][lonIndex]; null marks a cell without any non-null sample.
 */
export interface RasterSnapshot {
    label: string | null;
    lats: number[]; // ascending
    lons: number[]; // ascending
    latStep: number;
    lonStep: number;
    values: (number | null)[][];
}

export interface CountryPolygon {
    name: string;
    iso_code: string | null;
    geometry: Polygon | MultiPolygon;
}

export interface Bounds {
    west: number;
    south: number;
    east: number;
    north: number;
}
