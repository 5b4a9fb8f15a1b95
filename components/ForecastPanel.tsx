import React from 'react';
import { Loader2, AlertTriangle, Database, Download } from 'lucide-react';
import { apiClient } from '../services/apiClient';
import { useApiQuery } from '../hooks/useApiQuery';
import { PLOTS_BASE, formatDate } from '../constants';
import WindPowerMap from './WindPowerMap';
import RankingTable from './RankingTable';
import RankingChart from './RankingChart';
import HourlyAverageChart from './HourlyAverageChart';

interface ForecastPanelProps {
  date: string;
  cycle: string;
  hour: number | null;
}

const IconLoader = () => <Loader2 className="h-12 w-12 animate-spin text-cyan-500" />;
const IconError = () => <AlertTriangle className="h-12 w-12 text-red-400" />;

const ForecastPanel: React.FC<ForecastPanelProps> = ({ date, cycle, hour }) => {
  const samples = useApiQuery(
    signal => apiClient.getSamples(date, cycle, hour ?? 0, signal),
    [date, cycle, hour],
    hour !== null
  );
  const rankings = useApiQuery(signal => apiClient.getRankings(date, cycle, signal), [date, cycle]);
  const hourly = useApiQuery(signal => apiClient.getHourlyAverages(date, cycle, signal), [date, cycle]);

  const error = samples.error ?? rankings.error ?? hourly.error;
  if (error) {
    return (
      <div className="bg-red-950/30 border border-red-500/20 p-12 rounded-2xl text-center flex flex-col items-center backdrop-blur-md">
        <IconError />
        <p className="mt-6 text-xl text-red-200 font-medium">Failed to load forecast</p>
        <p className="text-red-300/70 text-sm mt-2 font-mono">{error}</p>
      </div>
    );
  }

  if (!samples.data && !rankings.data) {
    return (
      <div className="flex flex-col justify-center items-center h-96 bg-slate-900/20 border border-white/5 rounded-2xl backdrop-blur-sm">
        <IconLoader />
        <p className="mt-4 text-slate-400 font-mono text-sm animate-pulse">Loading {formatDate(date)} {cycle} UTC...</p>
      </div>
    );
  }

  return (
    <div className="space-y-6">
      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <div className="space-y-3">
          <div className="flex items-center justify-between">
            <h3 className="text-slate-100 font-semibold text-sm tracking-wide">
              WIND POWER DENSITY {hour !== null && <span className="text-cyan-400 font-mono">+{hour}h</span>}
            </h3>
            {samples.isLoading && <Loader2 className="h-4 w-4 animate-spin text-cyan-400" />}
          </div>
          {samples.data && samples.data.length > 0 ? (
            <WindPowerMap samples={samples.data} />
          ) : (
            <div className="bg-slate-900/30 border border-white/5 border-dashed p-12 rounded-2xl text-center flex flex-col items-center">
              <Database className="h-8 w-8 text-slate-500" />
              <p className="text-slate-400 text-sm mt-2">No grid data for this hour.</p>
            </div>
          )}
        </div>
        <RankingTable data={rankings.data ?? []} />
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <RankingChart data={rankings.data ?? []} />
        <HourlyAverageChart data={hourly.data ?? []} selectedHour={hour} />
      </div>

      <div className="flex flex-wrap gap-3 text-xs font-mono">
        <a
          href={`${PLOTS_BASE}/wpd_map_${date}_${cycle}.png`}
          target="_blank"
          rel="noreferrer"
          className="flex items-center gap-2 px-3 py-1.5 rounded-full border border-white/10 text-slate-400 hover:text-white hover:bg-white/5"
        >
          <Download className="h-3 w-3" /> Daily maps (PNG)
        </a>
        <a
          href={`${PLOTS_BASE}/country_rankings_${date}_${cycle}.csv`}
          className="flex items-center gap-2 px-3 py-1.5 rounded-full border border-white/10 text-slate-400 hover:text-white hover:bg-white/5"
        >
          <Download className="h-3 w-3" /> Rankings (CSV)
        </a>
      </div>
    </div>
  );
};

export default ForecastPanel;
