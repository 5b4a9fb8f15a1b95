import { validateCycleRequest } from '../cycles';
import type { ForecastDatabase } from '../db';
import { NoDataFound } from '../errors';
import { log } from '../log';
import type { CountryPolygon } from '../types';
import { artifactPaths, rankingsToCsv, writeArtifact } from './exportService';
import { getSamples, replaceRankings } from './forecastStore';
import type { MapRenderer } from './mapRenderer';
import { countryMeans, rankCountries } from './rankingService';
import { buildDailyRasters, buildRaster, rasterAxes } from './raster';

export interface AggregationDeps {
    db: ForecastDatabase;
    // Loaded lazily so a missing boundary file only fails the aggregation stage
    countries: () => readonly CountryPolygon[];
    renderer: MapRenderer;
    plotsDir: string;
    gridResolution: number;
}

/**
 * Turns a cycle's stored samples into the faceted map, the country ranking
 * rows and the ranking CSV. Returns the number of ranked countries.
 */
export async function aggregate(deps: AggregationDeps, date: string, cycle: string): Promise<number> {
    const target = validateCycleRequest(date, cycle);
    const label = `[AGG] ${date}/${cycle}`;

    const samples = getSamples(deps.db, target.date, target.cycle);
    if (samples.length === 0) {
        throw new NoDataFound(`No samples stored for ${date}/${cycle}`, { context: { date, cycle } });
    }
    const countries = deps.countries();

    log(`${label}: aggregating ${samples.length} samples`);
    console.time(label);
    try {
        const axes = rasterAxes(samples, deps.gridResolution);
        const daily = buildDailyRasters(samples, target.date, axes);
        const total = buildRaster(samples, axes, 'all');

        const paths = artifactPaths(deps.plotsDir, target.date, target.cycle);
        writeArtifact(paths.map, deps.renderer.render(daily, countries));
        log(`${label}: wrote ${paths.map} (${daily.length} days)`);

        const rankings = rankCountries(countryMeans(total, countries));
        replaceRankings(deps.db, target.date, target.cycle, rankings);
        writeArtifact(paths.rankings, rankingsToCsv(rankings));
        log(`${label}: ranked ${rankings.length} countries`);
        return rankings.length;
    } finally {
        console.timeEnd(label);
    }
}
