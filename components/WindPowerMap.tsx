import React, { useMemo } from 'react';
import type { ForecastSample } from '../types';
import { NO_DATA_COLOUR, VIRIDIS, formatDensity } from '../constants';

interface WindPowerMapProps {
  samples: ForecastSample[];
  cellSize?: number; // px per grid cell
}

export const colourFor = (t: number) => {
  const x = Math.min(1, Math.max(0, Number.isFinite(t) ? t : 0)) * (VIRIDIS.length - 1);
  const i = Math.min(VIRIDIS.length - 2, Math.floor(x));
  const f = x - i;
  const [a, b] = [VIRIDIS[i], VIRIDIS[i + 1]];
  const channel = (k: number) => Math.round(a[k] + (b[k] - a[k]) * f);
  return `rgb(${channel(0)}, ${channel(1)}, ${channel(2)})`;
};

const WindPowerMap: React.FC<WindPowerMapProps> = ({ samples, cellSize = 14 }) => {
  const grid = useMemo(() => {
    const lats = [...new Set(samples.map(s => s.lat))].sort((a, b) => b - a); // north at the top
    const lons = [...new Set(samples.map(s => s.lon))].sort((a, b) => a - b);
    const values = samples.map(s => s.wind_power_density).filter((v): v is number => v !== null);
    const min = values.length > 0 ? Math.min(...values) : 0;
    const max = values.length > 0 ? Math.max(...values) : 0;
    return { lats, lons, min, max };
  }, [samples]);

  if (samples.length === 0) {
    return <p className="p-6 text-center text-sm text-slate-500">No grid data for this hour.</p>;
  }

  const { lats, lons, min, max } = grid;
  const span = max > min ? max - min : 1;
  const latIndex = new Map(lats.map((lat, i) => [lat, i]));
  const lonIndex = new Map(lons.map((lon, i) => [lon, i]));

  return (
    <div className="bg-slate-900/60 border border-white/10 rounded-2xl p-4 flex flex-col gap-3">
      <svg
        role="img"
        aria-label="Wind power density map"
        viewBox={`0 0 ${lons.length * cellSize} ${lats.length * cellSize}`}
        className="w-full h-auto"
      >
        {samples.map(s => (
          <rect
            key={`${s.lat}|${s.lon}`}
            x={(lonIndex.get(s.lon) ?? 0) * cellSize}
            y={(latIndex.get(s.lat) ?? 0) * cellSize}
            width={cellSize}
            height={cellSize}
            fill={s.wind_power_density === null ? NO_DATA_COLOUR : colourFor((s.wind_power_density - min) / span)}
          >
            <title>{`${s.lat}°, ${s.lon}°: ${formatDensity(s.wind_power_density)} W/m²`}</title>
          </rect>
        ))}
      </svg>
      <div className="flex items-center gap-3 text-[10px] font-mono text-slate-400">
        <span>{formatDensity(min)}</span>
        <div
          className="h-2 flex-grow rounded"
          style={{ background: `linear-gradient(to right, ${VIRIDIS.map(([r, g, b]) => `rgb(${r}, ${g}, ${b})`).join(', ')})` }}
        />
        <span>{formatDensity(max)} W/m²</span>
      </div>
    </div>
  );
};

export default WindPowerMap;
