import React from 'react';
import { ResponsiveContainer, BarChart, Bar, XAxis, YAxis, Tooltip, CartesianGrid, Cell } from 'recharts';
import type { CountryRanking } from '../types';
import { tooltipValue } from '../constants';
import { AlertCircle } from 'lucide-react';

interface RankingChartProps {
  data: CountryRanking[];
  limit?: number;
}

const getBarColor = (rank: number) => {
  switch (rank) {
    case 1: return '#eab308';
    case 2: return '#94a3b8';
    case 3: return '#ea580c';
  }
  return '#22d3ee';
};

const RankingChart: React.FC<RankingChartProps> = ({ data, limit = 15 }) => {
  const chartData = [...data]
    .sort((a, b) => a.rank - b.rank)
    .slice(0, limit)
    .map(d => ({ name: d.country, rank: d.rank, value: d.avg_wind_power_density }));

  if (chartData.length === 0) {
    return (
      <div className="w-full h-full bg-slate-900/40 border border-white/10 rounded-2xl p-6 flex flex-col items-center justify-center text-center">
        <div className="p-4 bg-slate-800/50 rounded-full mb-3">
          <AlertCircle className="h-8 w-8 text-slate-500" />
        </div>
        <h3 className="text-lg font-semibold text-slate-300">No Chart Data</h3>
        <p className="text-sm text-slate-500 mt-1">This cycle has not been aggregated yet.</p>
      </div>
    );
  }

  return (
    <div className="w-full h-[480px] bg-slate-900/40 border border-white/10 rounded-2xl p-6 flex flex-col backdrop-blur-md shadow-2xl">
      <div className="mb-6">
        <h3 className="text-lg font-semibold text-white">Top Countries</h3>
        <p className="text-sm text-slate-400">Area-weighted mean over the 72 h window</p>
      </div>
      <div className="flex-grow">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={chartData} layout="vertical" margin={{ top: 0, right: 30, left: 0, bottom: 10 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#334155" opacity={0.3} horizontal={false} />
            <XAxis
              type="number"
              stroke="#64748b"
              tick={{ fontSize: 10, fontFamily: 'JetBrains Mono' }}
              axisLine={false}
              tickLine={false}
              domain={[0, 'auto']}
            />
            <YAxis
              dataKey="name"
              type="category"
              stroke="#94a3b8"
              width={120}
              tick={{ fontSize: 10, fill: '#cbd5e1' }}
              axisLine={false}
              tickLine={false}
              interval={0}
            />
            <Tooltip
              cursor={{ fill: 'rgba(255, 255, 255, 0.05)' }}
              formatter={value => [tooltipValue(value), 'Mean WPD']}
              contentStyle={{ background: '#0f172a', border: '1px solid rgba(255,255,255,0.1)', fontSize: 12 }}
            />
            <Bar dataKey="value" radius={[0, 4, 4, 0]} barSize={16}>
              {chartData.map(entry => (
                <Cell key={entry.name} fill={getBarColor(entry.rank)} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default RankingChart;
