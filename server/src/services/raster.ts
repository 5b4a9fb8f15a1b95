import { forecastDay } from '../cycles';
import type { Bounds, ForecastSample, RasterSnapshot } from '../types';
import { averageBy, distinctSorted } from './averaging';

export interface RasterAxes {
    lats: number[];
    lons: number[];
    latStep: number;
    lonStep: number;
}

const smallestGap = (sorted: readonly number[]): number | null => {
    let gap: number | null = null;
    for (let i = 1; i < sorted.length; i++) {
        const d = sorted[i] - sorted[i - 1];
        if (d > 0 && (gap === null || d < gap)) gap = d;
    }
    return gap;
};

/**
 * Lattice axes covering every sample coordinate. Cell size per axis is the
 * smallest spacing between distinct coordinates; a single-valued axis borrows
 * the other axis's spacing, and a single point falls back to `fallbackStep`.
 */
export function rasterAxes(samples: readonly ForecastSample[], fallbackStep: number): RasterAxes {
    const lats = distinctSorted(samples.map(s => s.lat));
    const lons = distinctSorted(samples.map(s => s.lon));
    const latGap = smallestGap(lats);
    const lonGap = smallestGap(lons);
    return {
        lats,
        lons,
        latStep: latGap ?? lonGap ?? fallbackStep,
        lonStep: lonGap ?? latGap ?? fallbackStep,
    };
}

const cellKey = (lat: number, lon: number) => `${lat}|${lon}`;

/**
 * Averages wind power density per (lat, lon), ignoring nulls. A cell whose
 * samples are all null stays null.
 */
export function buildRaster(samples: readonly ForecastSample[], axes: RasterAxes, label: string | null = null): RasterSnapshot {
    const means = averageBy(samples, s => cellKey(s.lat, s.lon), s => s.wind_power_density);
    const values = axes.lats.map(lat => axes.lons.map(lon => means.get(cellKey(lat, lon))?.mean ?? null));
    return { label, ...axes, values };
}

/**
 * One raster per forecast day (run date at 00 UTC + forecast hour), in day
 * order, all sharing the same axes so the panels line up.
 */
export function buildDailyRasters(samples: readonly ForecastSample[], runDate: string, axes: RasterAxes): RasterSnapshot[] {
    const byDay = new Map<string, ForecastSample[]>();
    for (const s of samples) {
        const day = forecastDay(runDate, s.forecast_hour);
        const bucket = byDay.get(day);
        if (bucket) bucket.push(s);
        else byDay.set(day, [s]);
    }
    return [...byDay.keys()]
        .sort()
        .map(day => buildRaster(byDay.get(day) ?? [], axes, day));
}

export interface RasterCell {
    lat: number;
    lon: number;
    value: number | null;
    bounds: Bounds;
}

export function cellBounds(raster: RasterSnapshot, latIndex: number, lonIndex: number): Bounds {
    const lat = raster.lats[latIndex];
    const lon = raster.lons[lonIndex];
    return {
        west: lon - raster.lonStep / 2,
        east: lon + raster.lonStep / 2,
        south: lat - raster.latStep / 2,
        north: lat + raster.latStep / 2,
    };
}

export function rasterExtent(raster: RasterSnapshot): Bounds | null {
    if (raster.lats.length === 0 || raster.lons.length === 0) return null;
    return {
        west: raster.lons[0] - raster.lonStep / 2,
        east: raster.lons[raster.lons.length - 1] + raster.lonStep / 2,
        south: raster.lats[0] - raster.latStep / 2,
        north: raster.lats[raster.lats.length - 1] + raster.latStep / 2,
    };
}

export function* rasterCells(raster: RasterSnapshot): Generator<RasterCell> {
    for (let i = 0; i < raster.lats.length; i++) {
        for (let j = 0; j < raster.lons.length; j++) {
            yield { lat: raster.lats[i], lon: raster.lons[j], value: raster.values[i][j], bounds: cellBounds(raster, i, j) };
        }
    }
}
