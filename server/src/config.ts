import cron from 'node-cron';
import { z } from 'zod';
import { NATURAL_EARTH_COUNTRIES_URL } from './constants';
import { StaleConfiguration } from './errors';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(v => v === 'true' || v === '1' || v === 'yes');

const envSchema = z
    .object({
        DATABASE_PATH: z.string().min(1).default('data/processed/gfs_data.db'),
        PLOTS_DIR: z.string().min(1).default('plots'),
        STATIC_DIR: z.string().min(1).default('dist/public'),
        COUNTRIES_PATH: z.string().min(1).default('data/geospatial/ne_110m_admin_0_countries.geojson'),
        COUNTRIES_URL: z.string().url().default(NATURAL_EARTH_COUNTRIES_URL),
        COUNTRY_CONTINENT: z.string().default('Europe'),
        PORT: z.coerce.number().int().min(0).max(65535).default(3001),
        SCHEDULE_CRON: z
            .string()
            .default('15 0,6,12,18 * * *')
            .refine(expr => cron.validate(expr), 'SCHEDULE_CRON is not a valid cron expression'),
        SCHEDULE_TIMEZONE: z.string().min(1).default('Etc/UTC'),
        RUN_ON_START: booleanFlag.default('true'),
        GRID_LAT_MIN: z.coerce.number().min(-90).max(90).default(35),
        GRID_LAT_MAX: z.coerce.number().min(-90).max(90).default(70),
        GRID_LON_MIN: z.coerce.number().min(-180).max(180).default(-10),
        GRID_LON_MAX: z.coerce.number().min(-180).max(180).default(40),
        GRID_RESOLUTION: z.coerce.number().positive().default(2.5),
        OPEN_METEO_URL: z.string().url().default('https://api.open-meteo.com/v1/gfs'),
    })
    .refine(env => env.GRID_LAT_MIN <= env.GRID_LAT_MAX, 'GRID_LAT_MIN must not exceed GRID_LAT_MAX')
    .refine(env => env.GRID_LON_MIN <= env.GRID_LON_MAX, 'GRID_LON_MIN must not exceed GRID_LON_MAX');

export interface GridSpec {
    latMin: number;
    latMax: number;
    lonMin: number;
    lonMax: number;
    resolution: number;
}

export interface AppConfig {
    databasePath: string;
    plotsDir: string;
    staticDir: string;
    countriesPath: string;
    countriesUrl: string;
    countryContinent: string | null;
    port: number;
    scheduleCron: string;
    scheduleTimezone: string;
    runOnStart: boolean;
    grid: GridSpec;
    openMeteoUrl: string;
}

/**
 * Builds the typed configuration from environment variables.
 * Blank values fall back to their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'env'}: ${i.message}`).join('; ');
        throw new StaleConfiguration(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;
    const continent = e.COUNTRY_CONTINENT.trim();

    return Object.freeze({
        databasePath: e.DATABASE_PATH,
        plotsDir: e.PLOTS_DIR,
        staticDir: e.STATIC_DIR,
        countriesPath: e.COUNTRIES_PATH,
        countriesUrl: e.COUNTRIES_URL,
        countryContinent: continent === '' || continent === '*' ? null : continent,
        port: e.PORT,
        scheduleCron: e.SCHEDULE_CRON,
        scheduleTimezone: e.SCHEDULE_TIMEZONE,
        runOnStart: e.RUN_ON_START,
        grid: Object.freeze({
            latMin: e.GRID_LAT_MIN,
            latMax: e.GRID_LAT_MAX,
            lonMin: e.GRID_LON_MIN,
            lonMax: e.GRID_LON_MAX,
            resolution: e.GRID_RESOLUTION,
        }),
        openMeteoUrl: e.OPEN_METEO_URL,
    });
}
