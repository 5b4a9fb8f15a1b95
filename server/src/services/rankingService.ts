import type { CountryPolygon, RankedCountry, RasterSnapshot } from '../types';
import { boundsIntersect, coverageFraction, geometryBounds } from './geometry';
import { rasterCells } from './raster';

export interface CountryMean {
    country: string;
    mean: number;
    weight: number; // summed cell coverage
}

/**
 * Area-weighted mean of the raster over each country. A cell's weight is the
 * fraction of it covered by the country polygon; cells without data are left
 * out. Countries with no covered cell holding data are omitted.
 * Output keeps polygon order.
 */
export function countryMeans(raster: RasterSnapshot, polygons: readonly CountryPolygon[]): CountryMean[] {
    const cells = [...rasterCells(raster)].filter(c => c.value !== null);
    const result: CountryMean[] = [];

    for (const polygon of polygons) {
        const bbox = geometryBounds(polygon.geometry);
        if (!bbox) continue;

        let weighted = 0;
        let weight = 0;
        for (const cell of cells) {
            if (cell.value === null || !boundsIntersect(bbox, cell.bounds)) continue;
            const w = coverageFraction(polygon.geometry, cell.bounds);
            if (w <= 0) continue;
            weighted += w * cell.value;
            weight += w;
        }
        if (weight > 0) {
            result.push({ country: polygon.name, mean: weighted / weight, weight });
        }
    }
    return result;
}

/**
 * Dense ranking by descending mean. Array.prototype.sort is stable, so equal
 * means keep input order.
 */
export function rankCountries(means: readonly CountryMean[]): RankedCountry[] {
    return [...means]
        .sort((a, b) => b.mean - a.mean)
        .map((m, i) => ({ country: m.country, avg_wind_power_density: m.mean, rank: i + 1 }));
}
