import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StaleConfiguration } from '../errors';
import { setLogger } from '../log';
import { ensureCountryDataset, loadCountryPolygons, parseCountryCollection } from '../services/countryService';
import { box } from './fixtures';

const feature = (properties: Record<string, unknown> | null, geometry: unknown) => ({
    type: 'Feature',
    properties,
    geometry,
});

const collection = {
    type: 'FeatureCollection',
    features: [
        feature({ NAME: 'Alpland', ISO_A3: 'ALP', CONTINENT: 'Europe' }, box(9, 49, 11, 51)),
        feature({ ADMIN: 'Seaside', ISO_A3: '-99', CONTINENT: 'Europe' }, box(12, 49.5, 13, 50.5)),
        feature({ NAME: 'Farland', CONTINENT: 'Asia' }, box(100, 10, 101, 11)),
        feature({ NAME: 'Alpland', CONTINENT: 'Europe' }, box(20, 49, 21, 50)),
        feature({ NAME: 'Pointland', CONTINENT: 'Europe' }, { type: 'Point', coordinates: [0, 0] }),
        feature(null, box(0, 0, 1, 1)),
    ],
};

describe('parseCountryCollection', () => {
    it('normalises names and merges duplicates', () => {
        const countries = parseCountryCollection(collection);
        expect(countries.map(c => c.name)).toEqual(['Alpland', 'Seaside', 'Farland']);
        expect(countries[0].iso_code).toBe('ALP');
        expect(countries[0].geometry.type).toBe('MultiPolygon');
        expect(countries[0].geometry.coordinates).toHaveLength(2);
        expect(countries[1]).toEqual({ name: 'Seaside', iso_code: null, geometry: box(12, 49.5, 13, 50.5) });
    });

    it('filters by continent', () => {
        expect(parseCountryCollection(collection, { continent: 'Asia' }).map(c => c.name)).toEqual(['Farland']);
    });

    it('accepts WGS84 crs members and rejects projected ones', () => {
        const crs = (name: string) => ({ ...collection, crs: { type: 'name', properties: { name } } });
        expect(parseCountryCollection(crs('urn:ogc:def:crs:OGC:1.3:CRS84'))).toHaveLength(3);
        expect(parseCountryCollection(crs('EPSG:4326'))).toHaveLength(3);
        expect(() => parseCountryCollection(crs('EPSG:3857'))).toThrow(StaleConfiguration);
    });

    it('rejects anything that is not a FeatureCollection', () => {
        expect(() => parseCountryCollection({ type: 'Feature' })).toThrow(StaleConfiguration);
        expect(() => parseCountryCollection(null)).toThrow(StaleConfiguration);
    });
});

describe('country dataset on disk', () => {
    let dir: string;

    beforeEach(() => {
        setLogger(() => {});
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wpd-countries-'));
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('asks for setup when the file is missing', () => {
        expect(() => loadCountryPolygons(path.join(dir, 'missing.geojson'), { continent: null })).toThrow(/setup/);
    });

    it('loads a saved dataset', () => {
        const file = path.join(dir, 'countries.geojson');
        fs.writeFileSync(file, JSON.stringify(collection));
        expect(loadCountryPolygons(file, { continent: 'Europe' }).map(c => c.name)).toEqual(['Alpland', 'Seaside']);
    });

    it('downloads the dataset once', async () => {
        const fetchMock = vi.fn(async () => new Response(JSON.stringify(collection)));
        vi.stubGlobal('fetch', fetchMock);
        const file = path.join(dir, 'geo', 'countries.geojson');

        expect(await ensureCountryDataset(file, 'https://example.test/countries.geojson')).toBe(true);
        expect(await ensureCountryDataset(file, 'https://example.test/countries.geojson')).toBe(false);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual(collection);
    });

    it('reports a failed download as a setup problem', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));
        const file = path.join(dir, 'countries.geojson');

        await expect(ensureCountryDataset(file, 'https://example.test/countries.geojson')).rejects.toBeInstanceOf(
            StaleConfiguration
        );
        expect(fs.existsSync(file)).toBe(false);
    });
});
