// @vitest-environment jsdom
import React from 'react';
import { afterEach, describe, expect, it } from 'vitest';
import { cleanup, render, screen } from '@testing-library/react';
import RankingTable from './RankingTable';

const row = (country: string, avg: number, rank: number) => ({
  forecast_date: '20250807',
  cycle: '12',
  country,
  avg_wind_power_density: avg,
  rank,
});

describe('RankingTable', () => {
  afterEach(cleanup);

  it('lists countries in rank order', () => {
    render(<RankingTable data={[row('Alpland', 100, 2), row('Seaside', 300.04, 1)]} />);

    const cells = screen.getAllByRole('row').slice(1).map(r => Array.from(r.querySelectorAll('td')).map(td => td.textContent));
    expect(cells).toEqual([
      ['1', 'Seaside', '300.0'],
      ['2', 'Alpland', '100.0'],
    ]);
  });

  it('shows a placeholder without rankings', () => {
    render(<RankingTable data={[]} />);
    expect(screen.getByText('No rankings for this cycle yet.')).toBeTruthy();
  });
});
