import React from 'react';
import { ResponsiveContainer, LineChart, Line, XAxis, YAxis, Tooltip, CartesianGrid, ReferenceLine } from 'recharts';
import type { HourlyAverage } from '../types';
import { tooltipValue } from '../constants';

interface HourlyAverageChartProps {
  data: HourlyAverage[];
  selectedHour: number | null;
}

// Domain-wide mean per forecast hour; hours with no data leave a gap in the line.
const HourlyAverageChart: React.FC<HourlyAverageChartProps> = ({ data, selectedHour }) => (
  <div className="w-full h-72 bg-slate-900/40 border border-white/10 rounded-2xl p-6 flex flex-col backdrop-blur-md shadow-2xl">
    <div className="mb-4">
      <h3 className="text-lg font-semibold text-white">Hourly Mean</h3>
      <p className="text-sm text-slate-400">Average wind power density across the grid</p>
    </div>
    <div className="flex-grow">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#334155" opacity={0.3} />
          <XAxis
            dataKey="forecast_hour"
            stroke="#64748b"
            tick={{ fontSize: 10, fontFamily: 'JetBrains Mono' }}
            tickFormatter={(h: number) => `+${h}h`}
          />
          <YAxis stroke="#64748b" tick={{ fontSize: 10 }} width={50} />
          <Tooltip
            labelFormatter={(h: number) => `Forecast hour +${h}`}
            formatter={value => [tooltipValue(value), 'Mean WPD']}
            contentStyle={{ background: '#0f172a', border: '1px solid rgba(255,255,255,0.1)', fontSize: 12 }}
          />
          {selectedHour !== null && <ReferenceLine x={selectedHour} stroke="#eab308" strokeDasharray="4 4" />}
          <Line
            type="monotone"
            dataKey="avg_wind_power_density"
            stroke="#22d3ee"
            strokeWidth={2}
            dot={false}
            connectNulls={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  </div>
);

export default HourlyAverageChart;
