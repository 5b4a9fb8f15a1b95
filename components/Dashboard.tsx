import React, { useState, useEffect } from 'react';
import { CalendarDays, Clock, Timer, Loader2 } from 'lucide-react';
import { apiClient } from '../services/apiClient';
import { useApiQuery } from '../hooks/useApiQuery';
import { CYCLE_LABELS, formatDate } from '../constants';
import ForecastPanel from './ForecastPanel';

// Keep the current pick when it is still on offer, otherwise take the fallback.
const keepOr = <T,>(current: T | null, options: T[] | null, fallback: (options: T[]) => T | undefined): T | null => {
  if (!options || options.length === 0) return null;
  if (current !== null && options.includes(current)) return current;
  return fallback(options) ?? null;
};

const buttonClass = (selected: boolean) =>
  `relative px-4 py-2 text-sm font-medium rounded-lg transition-all duration-200 whitespace-nowrap focus:outline-none border ${selected
    ? 'bg-slate-800 border-cyan-500/50 text-cyan-400 shadow-[0_0_15px_rgba(34,211,238,0.15)]'
    : 'bg-slate-950/50 border-white/5 text-slate-400 hover:border-white/20 hover:text-slate-200 hover:bg-white/5'
  }`;

const SectionHeader: React.FC<{ icon: React.ReactNode; title: string }> = ({ icon, title }) => (
  <div className="flex items-center justify-between mb-3">
    <h3 className="text-xs font-mono text-slate-400 uppercase tracking-widest flex items-center gap-2">
      {icon}
      {title}
    </h3>
    <div className="h-px flex-grow bg-gradient-to-r from-white/10 to-transparent ml-4"></div>
  </div>
);

const Dashboard: React.FC = () => {
  const [date, setDate] = useState<string | null>(null);
  const [cycle, setCycle] = useState<string | null>(null);
  const [hour, setHour] = useState<number | null>(null);

  const dates = useApiQuery(signal => apiClient.getDates(signal), []);
  const cycles = useApiQuery(signal => apiClient.getCycles(date ?? '', signal), [date], date !== null);
  const hours = useApiQuery(
    signal => apiClient.getForecastHours(date ?? '', cycle ?? '', signal),
    [date, cycle],
    date !== null && cycle !== null
  );

  // Newest date, latest cycle of that date, first forecast hour
  useEffect(() => setDate(current => keepOr(current, dates.data, o => o[0])), [dates.data]);
  useEffect(() => setCycle(current => keepOr(current, cycles.data, o => o[o.length - 1])), [cycles.data]);
  useEffect(() => setHour(current => keepOr(current, hours.data, o => o[0])), [hours.data]);

  // A new date or cycle invalidates the picks below it until their lists arrive
  const selectDate = (d: string) => {
    if (d === date) return;
    setDate(d);
    setCycle(null);
    setHour(null);
  };

  const selectCycle = (c: string) => {
    if (c === cycle) return;
    setCycle(c);
    setHour(null);
  };

  if (dates.isLoading && !dates.data) {
    return (
      <div className="flex justify-center items-center h-64">
        <Loader2 className="h-10 w-10 animate-spin text-cyan-500" />
      </div>
    );
  }

  if (dates.error || (dates.data && dates.data.length === 0)) {
    return (
      <div className="bg-slate-900/30 border border-white/5 border-dashed p-16 rounded-2xl text-center">
        <p className="text-lg text-slate-200 font-medium">No forecasts stored yet</p>
        <p className="text-slate-400 text-sm mt-2">
          {dates.error ?? 'Run the scheduler or a manual extraction to populate the store.'}
        </p>
      </div>
    );
  }

  const cycleOptions = cycles.isLoading ? [] : cycles.data ?? [];
  const hourOptions = hours.data ?? [];
  const hourIndex = hour === null ? 0 : Math.max(0, hourOptions.indexOf(hour));

  return (
    <div className="space-y-8">
      <div className="bg-slate-900/80 border border-white/10 rounded-2xl p-6 backdrop-blur-md shadow-2xl flex flex-col gap-6 relative overflow-hidden">
        <div>
          <SectionHeader icon={<CalendarDays className="w-3 h-3 text-cyan-500" />} title="Run Date" />
          <div className="flex items-center gap-2 overflow-x-auto pb-2">
            {(dates.data ?? []).map(d => (
              <button key={d} onClick={() => selectDate(d)} className={buttonClass(d === date)}>
                {formatDate(d)}
              </button>
            ))}
          </div>
        </div>

        <div>
          <SectionHeader icon={<Clock className="w-3 h-3 text-cyan-500" />} title="Cycle" />
          <div className="flex items-center gap-2">
            {cycleOptions.map(c => (
              <button key={c} onClick={() => selectCycle(c)} className={buttonClass(c === cycle)}>
                {CYCLE_LABELS[c] ?? c}
              </button>
            ))}
          </div>
        </div>

        <div>
          <SectionHeader icon={<Timer className="w-3 h-3 text-cyan-500" />} title="Forecast Hour" />
          <div className="flex items-center gap-4">
            <input
              type="range"
              aria-label="Forecast hour"
              min={0}
              max={Math.max(0, hourOptions.length - 1)}
              step={1}
              value={hourIndex}
              disabled={hourOptions.length === 0}
              onChange={e => setHour(hourOptions[Number(e.target.value)] ?? null)}
              className="flex-grow accent-cyan-400"
            />
            <span className="text-sm font-mono text-cyan-300 w-16 text-right">{hour === null ? '--' : `+${hour}h`}</span>
          </div>
        </div>
      </div>

      {date !== null && cycle !== null && <ForecastPanel date={date} cycle={cycle} hour={hour} />}
    </div>
  );
};

export default Dashboard;
