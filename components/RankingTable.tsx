import React from 'react';
import type { CountryRanking } from '../types';
import { Trophy } from 'lucide-react';
import { formatDensity } from '../constants';

interface RankingTableProps {
  data: CountryRanking[];
}

const RankingTable: React.FC<RankingTableProps> = ({ data }) => {
  const ordered = [...data].sort((a, b) => a.rank - b.rank);

  return (
    <div className="flex-grow bg-slate-900/60 border border-white/10 rounded-2xl shadow-2xl overflow-hidden backdrop-blur-xl flex flex-col">
      <div className="p-4 border-b border-white/5 bg-white/[0.02] flex items-center justify-between">
        <h3 className="text-slate-100 font-semibold flex items-center gap-2 text-sm tracking-wide">
          <Trophy className="h-4 w-4 text-amber-400" />
          COUNTRY RANKINGS
        </h3>
        <span className="text-[10px] font-mono text-cyan-400/80 bg-cyan-900/20 border border-cyan-500/20 px-2 py-0.5 rounded">
          SORT: HIGHEST W/m²
        </span>
      </div>

      <div className="overflow-x-auto flex-grow custom-scrollbar max-h-[480px]">
        <table className="w-full text-sm text-left border-collapse">
          <thead className="text-xs text-slate-500 uppercase font-mono bg-black/20 sticky top-0 z-10 backdrop-blur-md">
            <tr>
              <th className="px-4 py-3 font-medium tracking-wider border-b border-white/5">Rank</th>
              <th className="px-4 py-3 font-medium tracking-wider border-b border-white/5">Country</th>
              <th className="px-4 py-3 font-medium tracking-wider text-right text-cyan-500 border-b border-white/5">
                Mean WPD (W/m²)
              </th>
            </tr>
          </thead>
          <tbody className="divide-y divide-white/5">
            {ordered.map(row => {
              let rowClass = 'group transition-all duration-200 hover:bg-white/5';
              if (row.rank === 1) rowClass += ' bg-gradient-to-r from-yellow-500/10 to-transparent border-l-2 border-yellow-500';
              else if (row.rank === 2) rowClass += ' bg-gradient-to-r from-slate-400/10 to-transparent border-l-2 border-slate-400';
              else if (row.rank === 3) rowClass += ' bg-gradient-to-r from-orange-600/10 to-transparent border-l-2 border-orange-600';
              else rowClass += ' border-l-2 border-transparent hover:border-slate-700';

              return (
                <tr key={row.country} className={rowClass}>
                  <td className="px-4 py-3 whitespace-nowrap w-16 font-mono text-slate-400">{row.rank}</td>
                  <td className="px-4 py-3 font-semibold tracking-tight text-slate-200">{row.country}</td>
                  <td className="px-4 py-3 text-right font-mono font-bold text-cyan-300">
                    {formatDensity(row.avg_wind_power_density)}
                  </td>
                </tr>
              );
            })}
          </tbody>
        </table>
        {ordered.length === 0 && (
          <p className="p-6 text-center text-sm text-slate-500">No rankings for this cycle yet.</p>
        )}
      </div>
    </div>
  );
};

export default RankingTable;
