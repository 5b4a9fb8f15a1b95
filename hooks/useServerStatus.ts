import { useState, useEffect, useCallback, useRef } from 'react';
import type { ForecastCycle } from '../types';
import { apiClient } from '../services/apiClient';
import { STATUS_POLL_MS } from '../constants';

export type ConnectionState = 'Connecting' | 'Online' | 'Offline';

/**
 * Polls /api/status so the header can show whether the server is up and
 * which cycle it has most recently stored.
 */
export const useServerStatus = (pollMs = STATUS_POLL_MS) => {
  const [connection, setConnection] = useState<ConnectionState>('Connecting');
  const [latest, setLatest] = useState<ForecastCycle | null>(null);
  const [lastUpdated, setLastUpdated] = useState<number | null>(null);
  const [error, setError] = useState<string | null>(null);
  const controllerRef = useRef<AbortController | null>(null);

  const refresh = useCallback(async () => {
    controllerRef.current?.abort();
    const controller = new AbortController();
    controllerRef.current = controller;

    try {
      const status = await apiClient.getStatus(controller.signal);
      if (controller.signal.aborted) return;
      setLatest(status.latest);
      setLastUpdated(status.server_time);
      setConnection('Online');
      setError(null);
    } catch (e) {
      if (controller.signal.aborted) return;
      console.error('[STATUS] Failed to reach server:', e);
      setConnection('Offline');
      setError(e instanceof Error ? e.message : String(e));
    }
  }, []);

  useEffect(() => {
    void refresh();
    const interval = setInterval(() => void refresh(), pollMs);
    return () => {
      clearInterval(interval);
      controllerRef.current?.abort();
    };
  }, [refresh, pollMs]);

  return { connection, latest, lastUpdated, error, refresh };
};
