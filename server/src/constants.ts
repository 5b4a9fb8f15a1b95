
// GFS synoptic issuance times (UTC)
export const CYCLES = ['00', '06', '12', '18'] as const;

// Forecast window pulled per cycle: 0..72h every 3 hours
export const FORECAST_HOURS: readonly number[] = Array.from({ length: 25 }, (_, i) => i * 3);

// Standard sea-level air density (kg/m³)
export const AIR_DENSITY = 1.225;

// Hub-height wind variables requested from the grid source
export const WIND_SPEED_VAR = 'wind_speed_100m';
export const WIND_DIRECTION_VAR = 'wind_direction_100m';

export const NATURAL_EARTH_COUNTRIES_URL =
    'https://raw.githubusercontent.com/nvkelso/natural-earth-vector/master/geojson/ne_110m_admin_0_countries.geojson';

export const mapArtifactName = (date: string, cycle: string) => `wpd_map_${date}_${cycle}.png`;
export const rankingArtifactName = (date: string, cycle: string) => `country_rankings_${date}_${cycle}.csv`;
