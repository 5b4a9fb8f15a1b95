// @vitest-environment jsdom
import React from 'react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { act, cleanup, fireEvent, render, screen } from '@testing-library/react';
import Dashboard from './Dashboard';
import { apiClient } from '../services/apiClient';

vi.mock('./ForecastPanel', () => ({
  default: ({ date, cycle, hour }: { date: string; cycle: string; hour: number | null }) =>
    `panel ${date}/${cycle}/${hour}`,
}));

describe('Dashboard', () => {
  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it('drops the previous cycle when the date changes and waits for the new date\'s cycles', async () => {
    let resolveCycles: (value: string[]) => void = () => {};
    vi.spyOn(apiClient, 'getDates').mockResolvedValue(['20250808', '20250807']);
    vi.spyOn(apiClient, 'getCycles').mockImplementation(date =>
      date === '20250808' ? Promise.resolve(['12']) : new Promise(resolve => { resolveCycles = resolve; })
    );
    const getHours = vi.spyOn(apiClient, 'getForecastHours').mockResolvedValue([0, 3]);

    render(<Dashboard />);
    expect(await screen.findByText('panel 20250808/12/0')).toBeTruthy();

    fireEvent.click(screen.getByText('2025-08-07'));

    expect(screen.queryByText(/^panel/)).toBeNull();
    expect(screen.queryByText('12 UTC')).toBeNull();
    expect(getHours.mock.calls.some(([date, cycle]) => date === '20250807' && cycle === '12')).toBe(false);

    await act(async () => {
      resolveCycles(['00']);
    });

    expect(await screen.findByText('panel 20250807/00/0')).toBeTruthy();
    expect(getHours.mock.calls.map(([date, cycle]) => `${date}/${cycle}`)).toEqual(['20250808/12', '20250807/00']);
  });
});
