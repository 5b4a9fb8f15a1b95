import { useState, useEffect, useRef, type DependencyList } from 'react';

export interface ApiQueryState<T> {
  data: T | null;
  isLoading: boolean;
  error: string | null;
}

/**
 * Runs `load` whenever `deps` change. The previous request is aborted first and
 * only the newest request's outcome reaches state. Pass `enabled = false` to
 * clear the result without issuing a request.
 */
export function useApiQuery<T>(
  load: (signal: AbortSignal) => Promise<T>,
  deps: DependencyList,
  enabled = true
): ApiQueryState<T> {
  const [state, setState] = useState<ApiQueryState<T>>({ data: null, isLoading: enabled, error: null });
  const requestRef = useRef(0);
  const loadRef = useRef(load);
  loadRef.current = load;

  useEffect(() => {
    const requestId = ++requestRef.current;
    if (!enabled) {
      setState({ data: null, isLoading: false, error: null });
      return;
    }
    const controller = new AbortController();
    const isCurrent = () => requestId === requestRef.current && !controller.signal.aborted;

    setState(prev => ({ data: prev.data, isLoading: true, error: null }));
    loadRef.current(controller.signal)
      .then(data => {
        if (isCurrent()) setState({ data, isLoading: false, error: null });
      })
      .catch((e: unknown) => {
        if (!isCurrent()) return;
        const errorMessage = e instanceof Error ? e.message : 'An unknown error occurred.';
        console.error('[VIEWER] Request failed:', e);
        setState({ data: null, isLoading: false, error: errorMessage });
      });

    return () => {
      controller.abort();
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [enabled, ...deps]);

  return state;
}
