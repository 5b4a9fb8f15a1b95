import type { Polygon } from 'geojson';
import type { CountryPolygon, ForecastSample } from '../types';

export const box = (west: number, south: number, east: number, north: number): Polygon => ({
    type: 'Polygon',
    coordinates: [[[west, south], [east, south], [east, north], [west, north], [west, south]]],
});

// Alpland sits inside the (50, 10) cell, Seaside inside (50, 12.5)
export const ALPLAND: CountryPolygon = { name: 'Alpland', iso_code: 'ALP', geometry: box(9, 49, 11, 51) };
export const SEASIDE: CountryPolygon = { name: 'Seaside', iso_code: 'SEA', geometry: box(12, 49.5, 13, 50.5) };

export const sample = (
    lat: number,
    lon: number,
    forecast_hour: number,
    wind_power_density: number | null,
    forecast_date = '20250807',
    cycle = '12'
): ForecastSample => ({ forecast_date, cycle, lat, lon, forecast_hour, wind_power_density });

export const scenarioSamples = (date = '20250807', cycle = '12'): ForecastSample[] => [
    sample(50, 10, 0, 100, date, cycle),
    sample(50, 12.5, 0, 300, date, cycle),
    sample(50, 10, 3, 100, date, cycle),
    sample(50, 12.5, 3, 300, date, cycle),
];
