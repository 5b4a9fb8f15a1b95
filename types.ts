
// Shapes returned by the forecast API (server/src/types.ts on the server side).

export type Cycle = '00' | '06' | '12' | '18';

export interface ForecastCycle {
  date: string; // YYYYMMDD
  cycle: Cycle;
}

export interface ServerStatus {
  status: string;
  latest: ForecastCycle | null;
  server_time: number;
}

/**
 * One grid point of one forecast hour.
 */
export interface ForecastSample {
  forecast_date: string;
  cycle: string;
  lat: number;
  lon: number;
  forecast_hour: number;
  wind_power_density: number | null; // W/m²
}

export interface CountryRanking {
  forecast_date: string;
  cycle: string;
  country: string;
  avg_wind_power_density: number;
  rank: number;
}

export interface HourlyAverage {
  forecast_hour: number;
  avg_wind_power_density: number | null;
  sample_count: number;
}

export interface ApiErrorBody {
  error: {
    type: string;
    message: string;
  };
}
