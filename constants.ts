export const API_BASE = '/api';
export const PLOTS_BASE = '/plots';

// Server status is re-polled this often
export const STATUS_POLL_MS = 60 * 1000;

export const CYCLE_LABELS: Record<string, string> = {
  '00': '00 UTC',
  '06': '06 UTC',
  '12': '12 UTC',
  '18': '18 UTC',
};

// Viridis anchors, shared with the rendered PNG maps
export const VIRIDIS: [number, number, number][] = [
  [68, 1, 84],
  [59, 82, 139],
  [33, 145, 140],
  [94, 201, 98],
  [253, 231, 37],
];

export const NO_DATA_COLOUR = '#e6e6e6';

export const formatDate = (date: string) =>
  date.length === 8 ? `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}` : date;

export const formatDensity = (val: number | null | undefined) => {
  if (val === null || val === undefined || !Number.isFinite(val)) return '--';
  return val.toFixed(1);
};

export const tooltipValue = (value: unknown) =>
  typeof value === 'number' ? `${formatDensity(value)} W/m²` : '--';
