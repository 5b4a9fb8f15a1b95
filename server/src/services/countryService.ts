import fs from 'fs';
import type { MultiPolygon, Polygon, Position } from 'geojson';
import path from 'path';
import { z } from 'zod';
import { StaleConfiguration, describeError } from '../errors';
import { fetchWithRetry } from '../http';
import { log } from '../log';
import type { CountryPolygon } from '../types';

const position = z.array(z.number()).min(2);
const ring = z.array(position);

const geometrySchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('Polygon'), coordinates: z.array(ring) }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ring)) }),
]);

const collectionSchema = z.object({
    type: z.literal('FeatureCollection'),
    crs: z
        .object({ properties: z.object({ name: z.string() }).passthrough() })
        .passthrough()
        .optional(),
    features: z.array(
        z
            .object({
                properties: z.record(z.unknown()).nullable().optional(),
                geometry: z.unknown(),
            })
            .passthrough()
    ),
});

// Legacy GeoJSON `crs` members that still mean plain lon/lat degrees
const GEOGRAPHIC_CRS = /(CRS84|EPSG:{1,2}4326)$/i;

const NAME_KEYS = ['NAME', 'name', 'ADMIN', 'admin'];
const ISO_KEYS = ['ISO_A3', 'iso_a3', 'ADM0_A3', 'adm0_a3'];
const CONTINENT_KEYS = ['CONTINENT', 'continent'];

const pick = (props: Record<string, unknown>, keys: readonly string[]): string | null => {
    for (const key of keys) {
        const v = props[key];
        if (typeof v === 'string' && v.trim() !== '' && v !== '-99') return v.trim();
    }
    return null;
};

const asPolygons = (geometry: Polygon | MultiPolygon): Position[][][] =>
    geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;

export interface CountryFilter {
    continent: string | null;
}

/**
 * Normalises a country FeatureCollection into named polygons.
 * Features sharing a name are merged into one MultiPolygon (first occurrence
 * keeps its position); features without a polygonal geometry or a name are skipped.
 */
export function parseCountryCollection(json: unknown, filter: CountryFilter = { continent: null }): CountryPolygon[] {
    const parsed = collectionSchema.safeParse(json);
    if (!parsed.success) {
        throw new StaleConfiguration(`Country boundaries are not a GeoJSON FeatureCollection: ${parsed.error.issues[0]?.message}`);
    }
    const crsName = parsed.data.crs?.properties.name;
    if (crsName !== undefined && !GEOGRAPHIC_CRS.test(crsName)) {
        throw new StaleConfiguration(`Country boundaries use unsupported CRS "${crsName}"; expected WGS84 lon/lat`);
    }

    const byName = new Map<string, { iso_code: string | null; polygons: Position[][][] }>();
    for (const feature of parsed.data.features) {
        const props = feature.properties ?? {};
        const geometry = geometrySchema.safeParse(feature.geometry);
        const name = pick(props, NAME_KEYS);
        if (!geometry.success || name === null) continue;
        if (filter.continent !== null && pick(props, CONTINENT_KEYS) !== filter.continent) continue;

        const existing = byName.get(name);
        if (existing) {
            existing.polygons.push(...asPolygons(geometry.data));
        } else {
            byName.set(name, { iso_code: pick(props, ISO_KEYS), polygons: [...asPolygons(geometry.data)] });
        }
    }

    return [...byName].map(([name, { iso_code, polygons }]): CountryPolygon => {
        const geometry: Polygon | MultiPolygon = polygons.length === 1
            ? { type: 'Polygon', coordinates: polygons[0] }
            : { type: 'MultiPolygon', coordinates: polygons };
        return { name, iso_code, geometry };
    });
}

/**
 * Reads the country boundary dataset prepared by `setup`.
 */
export function loadCountryPolygons(filePath: string, filter: CountryFilter): CountryPolygon[] {
    if (!fs.existsSync(filePath)) {
        throw new StaleConfiguration(`Country boundaries not found at ${filePath}; run the setup command first`, {
            context: { filePath },
        });
    }
    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (e) {
        throw new StaleConfiguration(`Country boundaries at ${filePath} are not valid JSON`, { cause: e });
    }
    const countries = parseCountryCollection(json, filter);
    log(`[COUNTRIES] Loaded ${countries.length} country polygons${filter.continent ? ` (${filter.continent})` : ''}`);
    return countries;
}

/**
 * One-time setup step: downloads the boundary dataset when it is not on disk yet.
 * Returns true when a download happened.
 */
export async function ensureCountryDataset(filePath: string, url: string): Promise<boolean> {
    if (fs.existsSync(filePath)) {
        log(`[SETUP] Country boundaries already present at ${filePath}`);
        return false;
    }
    log(`[SETUP] Downloading country boundaries from ${url}...`);
    let body: string;
    try {
        const res = await fetchWithRetry(url, 3, 1000);
        if (!res.ok) throw new Error(`HTTP ${res.status}`);
        body = await res.text();
    } catch (e) {
        throw new StaleConfiguration(`Could not download country boundaries: ${describeError(e)}`, { cause: e });
    }
    // Reject anything we could not load later
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (e) {
        throw new StaleConfiguration(`Downloaded country boundaries are not valid JSON`, { cause: e });
    }
    parseCountryCollection(json);

    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, body);
    log(`[SETUP] Saved country boundaries to ${filePath}`);
    return true;
}
