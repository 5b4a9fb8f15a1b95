import type { ApiErrorBody, CountryRanking, ForecastSample, HourlyAverage, ServerStatus } from '../types';
import { API_BASE } from '../constants';

export class ApiError extends Error {
  constructor(message: string, readonly status: number, readonly type: string | null = null) {
    super(message);
    this.name = 'ApiError';
  }
}

const isErrorBody = (body: unknown): body is ApiErrorBody =>
  typeof body === 'object' && body !== null && 'error' in body &&
  typeof body.error === 'object' && body.error !== null &&
  'message' in body.error && typeof body.error.message === 'string' &&
  'type' in body.error && typeof body.error.type === 'string';

async function getJson<T>(path: string, signal?: AbortSignal): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, { signal });
  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null);
    if (isErrorBody(body)) throw new ApiError(body.error.message, res.status, body.error.type);
    throw new ApiError(`API Error: ${res.status}`, res.status);
  }
  return res.json();
}

const cyclePath = (date: string, cycle: string) =>
  `/forecasts/${encodeURIComponent(date)}/${encodeURIComponent(cycle)}`;

export const apiClient = {
  getStatus(signal?: AbortSignal): Promise<ServerStatus> {
    return getJson('/status', signal);
  },

  getDates(signal?: AbortSignal): Promise<string[]> {
    return getJson('/dates', signal);
  },

  getCycles(date: string, signal?: AbortSignal): Promise<string[]> {
    return getJson(`/dates/${encodeURIComponent(date)}/cycles`, signal);
  },

  getForecastHours(date: string, cycle: string, signal?: AbortSignal): Promise<number[]> {
    return getJson(`${cyclePath(date, cycle)}/hours`, signal);
  },

  getSamples(date: string, cycle: string, hour: number, signal?: AbortSignal): Promise<ForecastSample[]> {
    return getJson(`${cyclePath(date, cycle)}/samples?hour=${hour}`, signal);
  },

  getRankings(date: string, cycle: string, signal?: AbortSignal): Promise<CountryRanking[]> {
    return getJson(`${cyclePath(date, cycle)}/rankings`, signal);
  },

  getHourlyAverages(date: string, cycle: string, signal?: AbortSignal): Promise<HourlyAverage[]> {
    return getJson(`${cyclePath(date, cycle)}/hourly-average`, signal);
  },
};
