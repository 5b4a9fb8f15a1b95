import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { openDatabase, type ForecastDatabase } from '../db';
import { NoDataFound } from '../errors';
import { setLogger } from '../log';
import { aggregate, type AggregationDeps } from '../services/aggregationService';
import { getRankings, upsertSamples } from '../services/forecastStore';
import type { MapRenderer } from '../services/mapRenderer';
import { ALPLAND, SEASIDE, sample, scenarioSamples } from './fixtures';

describe('aggregate', () => {
    let db: ForecastDatabase;
    let plotsDir: string;
    let render: Mock<MapRenderer['render']>;
    let deps: AggregationDeps;

    beforeEach(() => {
        setLogger(() => {});
        vi.spyOn(console, 'time').mockImplementation(() => {});
        vi.spyOn(console, 'timeEnd').mockImplementation(() => {});
        db = openDatabase(':memory:');
        plotsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'wpd-plots-'));
        render = vi.fn<MapRenderer['render']>(() => Buffer.from('png'));
        deps = { db, countries: () => [ALPLAND, SEASIDE], renderer: { render }, plotsDir, gridResolution: 2.5 };
    });

    afterEach(() => {
        db.close();
        fs.rmSync(plotsDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('ranks countries by their covered wind power density', async () => {
        upsertSamples(db, scenarioSamples());

        expect(await aggregate(deps, '20250807', '12')).toBe(2);

        const rankings = getRankings(db, '20250807', '12');
        expect(rankings.map(r => [r.country, r.rank])).toEqual([
            ['Seaside', 1],
            ['Alpland', 2],
        ]);
        expect(rankings[0].avg_wind_power_density).toBeCloseTo(300, 6);
        expect(rankings[1].avg_wind_power_density).toBeCloseTo(100, 6);
    });

    it('writes the map and the ranking CSV', async () => {
        upsertSamples(db, scenarioSamples());
        await aggregate(deps, '20250807', '12');

        expect(fs.readFileSync(path.join(plotsDir, 'wpd_map_20250807_12.png'), 'utf8')).toBe('png');
        const lines = fs.readFileSync(path.join(plotsDir, 'country_rankings_20250807_12.csv'), 'utf8').trimEnd().split('\n');
        expect(lines[0]).toBe('country,avg_wind_power_density,rank');
        expect(lines.slice(1).map(l => [l.split(',')[0], l.split(',')[2]])).toEqual([
            ['Seaside', '1'],
            ['Alpland', '2'],
        ]);
    });

    it('renders one panel per forecast day', async () => {
        upsertSamples(db, [...scenarioSamples(), sample(50, 10, 24, 50), sample(50, 12.5, 48, 60)]);
        await aggregate(deps, '20250807', '12');

        const [rasters, countries] = render.mock.calls[0];
        expect(rasters.map(r => r.label)).toEqual(['2025-08-07', '2025-08-08', '2025-08-09']);
        expect(countries.map(c => c.name)).toEqual(['Alpland', 'Seaside']);
    });

    it('produces identical rankings when run twice', async () => {
        upsertSamples(db, scenarioSamples());
        await aggregate(deps, '20250807', '12');
        const first = getRankings(db, '20250807', '12');
        await aggregate(deps, '20250807', '12');
        expect(getRankings(db, '20250807', '12')).toEqual(first);
    });

    it('writes nothing when the cycle has no samples', async () => {
        upsertSamples(db, scenarioSamples('20250807', '06'));

        await expect(aggregate(deps, '20250807', '12')).rejects.toBeInstanceOf(NoDataFound);
        expect(getRankings(db, '20250807', '12')).toEqual([]);
        expect(render).not.toHaveBeenCalled();
        expect(fs.readdirSync(plotsDir)).toEqual([]);
    });
});
