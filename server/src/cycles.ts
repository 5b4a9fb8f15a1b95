import { CYCLES } from './constants';
import { StaleConfiguration } from './errors';
import type { Cycle, ForecastCycle } from './types';

const DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;

export const isCycle = (value: string): value is Cycle => CYCLES.some(c => c === value);

/**
 * Parses a YYYYMMDD forecast date into a UTC midnight timestamp (ms).
 * Returns null for malformed strings and impossible calendar dates (20250231).
 */
export function parseForecastDate(date: string): number | null {
    const m = DATE_RE.exec(date);
    if (!m) return null;
    const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
    const ts = Date.UTC(year, month - 1, day);
    const d = new Date(ts);
    if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
    return ts;
}

export const formatForecastDate = (ts: number): string => {
    const d = new Date(ts);
    const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
    const dd = String(d.getUTCDate()).padStart(2, '0');
    return `${d.getUTCFullYear()}${mm}${dd}`;
};

/**
 * Calendar day (YYYY-MM-DD) a forecast hour falls on, counted from the run date at 00 UTC.
 */
export function forecastDay(date: string, forecastHour: number): string {
    const base = parseForecastDate(date);
    if (base === null) throw new StaleConfiguration(`Invalid forecast date "${date}"`, { context: { date } });
    return new Date(base + forecastHour * 3600000).toISOString().slice(0, 10);
}

/**
 * Run time of a cycle as epoch ms (date at 00 UTC plus the cycle hour).
 */
export function cycleRunTime({ date, cycle }: ForecastCycle): number {
    const base = parseForecastDate(date);
    if (base === null) throw new StaleConfiguration(`Invalid forecast date "${date}"`, { context: { date } });
    return base + Number(cycle) * 3600000;
}

/**
 * Rejects a (date, cycle) request before any I/O happens.
 */
export function validateCycleRequest(date: string, cycle: string, now: Date = new Date()): ForecastCycle {
    if (!isCycle(cycle)) {
        throw new StaleConfiguration(`Cycle "${cycle}" is not one of ${CYCLES.join(', ')}`, { context: { date, cycle } });
    }
    const ts = parseForecastDate(date);
    if (ts === null) {
        throw new StaleConfiguration(`Date "${date}" is not a valid YYYYMMDD calendar date`, { context: { date, cycle } });
    }
    const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
    if (ts > today) {
        throw new StaleConfiguration(`Date ${date} is in the future`, { context: { date, cycle } });
    }
    const runTime = cycleRunTime({ date, cycle });
    if (runTime > now.getTime()) {
        throw new StaleConfiguration(`Cycle ${date}/${cycle} has not run yet`, {
            context: { date, cycle, runTime: new Date(runTime).toISOString() },
        });
    }
    return { date, cycle };
}

/**
 * Latest cycle expected to be published at `now`, allowing for the upstream
 * production delay:
 *   00-05 UTC -> previous day 18
 *   06-11 UTC -> 00
 *   12-17 UTC -> 06
 *   18-23 UTC -> 12
 */
export function targetCycle(now: Date): ForecastCycle {
    const hour = now.getUTCHours();
    const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());

    if (hour < 6) return { date: formatForecastDate(today - 86400000), cycle: '18' };
    if (hour < 12) return { date: formatForecastDate(today), cycle: '00' };
    if (hour < 18) return { date: formatForecastDate(today), cycle: '06' };
    return { date: formatForecastDate(today), cycle: '12' };
}
