import React from 'react';
import { useServerStatus } from './hooks/useServerStatus';
import Dashboard from './components/Dashboard';
import { Wind, Clock } from 'lucide-react';
import { formatDate } from './constants';

const App: React.FC = () => {
  const { connection, latest, lastUpdated } = useServerStatus();

  const getStatusColor = () => {
    if (connection === 'Online') return 'bg-emerald-500 shadow-[0_0_10px_rgba(16,185,129,0.5)]';
    if (connection === 'Offline') return 'bg-red-500 shadow-[0_0_10px_rgba(239,68,68,0.5)]';
    return 'bg-amber-500 animate-pulse shadow-[0_0_10px_rgba(245,158,11,0.5)]';
  };

  return (
    <div className="min-h-screen flex flex-col">
      <header className="sticky top-0 z-50 backdrop-blur-xl bg-slate-950/80 border-b border-white/5 shadow-lg">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 h-20 flex items-center justify-between">
          <div className="flex items-center gap-4">
            <div className="bg-gradient-to-br from-cyan-500/20 to-blue-500/10 p-2.5 rounded-xl border border-white/10">
              <Wind className="h-6 w-6 text-cyan-400" />
            </div>
            <div>
              <h1 className="text-2xl font-bold text-white tracking-tight font-sans">
                GFS <span className="text-transparent bg-clip-text bg-gradient-to-r from-cyan-400 to-blue-500">Wind Power</span>
              </h1>
              <p className="text-[10px] text-slate-400 font-mono uppercase tracking-[0.2em]">100 m wind power density • country rankings</p>
            </div>
          </div>

          <div className="flex flex-col items-end gap-2">
            <div className="flex items-center gap-3 bg-slate-900/80 px-3 py-1.5 rounded-full border border-white/10 shadow-inner">
              <div className={`h-2 w-2 rounded-full ${getStatusColor()}`} />
              <span className="text-[10px] font-mono font-bold text-slate-300 uppercase tracking-widest">{connection}</span>
            </div>
            <div className="flex items-center gap-2 text-[10px] text-slate-500 font-mono">
              <Clock className="h-3 w-3 opacity-50" />
              <span>
                LATEST CYCLE: {latest ? `${formatDate(latest.date)} ${latest.cycle}Z` : 'NONE'}
                {lastUpdated && ` • CHECKED ${new Date(lastUpdated).toLocaleTimeString()}`}
              </span>
            </div>
          </div>
        </div>
      </header>

      <main className="flex-grow container max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
        <Dashboard />
      </main>
    </div>
  );
};

export default App;
