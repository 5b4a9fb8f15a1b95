import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { log } from '../log';

export type ForecastDatabase = Database.Database;

/**
 * Opens (creating if needed) the forecast store and makes sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export const openDatabase = (dbPath: string): ForecastDatabase => {
    if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);

    // WAL: readers see the last committed snapshot while a stage is writing
    db.pragma('journal_mode = WAL');

    initDB(db);
    return db;
};

export const initDB = (db: ForecastDatabase) => {
    db.exec(`
        CREATE TABLE IF NOT EXISTS gfs_forecasts (
            forecast_date TEXT NOT NULL,
            cycle TEXT NOT NULL,
            lat REAL NOT NULL,
            lon REAL NOT NULL,
            forecast_hour INTEGER NOT NULL,
            wind_power_density REAL,
            PRIMARY KEY (forecast_date, cycle, lat, lon, forecast_hour)
        );
        CREATE INDEX IF NOT EXISTS idx_gfs_forecasts_hour ON gfs_forecasts(forecast_date, cycle, forecast_hour);

        CREATE TABLE IF NOT EXISTS country_rankings (
            forecast_date TEXT NOT NULL,
            cycle TEXT NOT NULL,
            country TEXT NOT NULL,
            avg_wind_power_density REAL,
            rank INTEGER NOT NULL,
            PRIMARY KEY (forecast_date, cycle, country)
        );
    `);
    log('[DB] Initialized SQLite database');
};
