/**
 * @jest-environment jsdom
 */
import React from 'react';
import { describe, it, expect, beforeAll } from '@jest/globals';
import { render, screen } from '@testing-library/react';
import VolatilityChart, { toChartRows } from './VolatilityChart';
import { OverlayChartSpec, SeriesKey, SeriesPoint, SeriesSpec } from '../types';
import { installResizeObserver } from './__fixtures__/resizeObserver';

beforeAll(() => installResizeObserver());

const series = (key: SeriesKey, points: SeriesPoint[]): SeriesSpec => ({
  key,
  name: key,
  color: '#000000',
  strokeWidth: 2,
  dashed: false,
  points,
});

const overlayOf = (...s: SeriesSpec[]): OverlayChartSpec => ({ xLabel: 'Date', yLabel: '7-Day Volatility', series: s });

const actual = series('actual', [
  { date: '2024-01-01', value: 0.4 },
  { date: '2024-01-02', value: null },
]);
const garch = series('garch', [
  { date: '2024-01-01', value: null },
  { date: '2024-01-02', value: 0.46 },
]);
const lstm = series('lstm', [{ date: '2024-01-01', value: 0.41 }]);

describe('toChartRows', () => {
  it('returns no rows without series', () => {
    expect(toChartRows(overlayOf())).toEqual([]);
  });

  it('keeps gaps of a single series as null', () => {
    expect(toChartRows(overlayOf(actual))).toEqual([
      { date: '2024-01-01', actual: 0.4 },
      { date: '2024-01-02', actual: null },
    ]);
  });

  it('lines two series up by position', () => {
    expect(toChartRows(overlayOf(actual, garch))).toEqual([
      { date: '2024-01-01', actual: 0.4, garch: null },
      { date: '2024-01-02', actual: null, garch: 0.46 },
    ]);
  });

  it('fills a missing point of a third series with null', () => {
    expect(toChartRows(overlayOf(actual, garch, lstm))).toEqual([
      { date: '2024-01-01', actual: 0.4, garch: null, lstm: 0.41 },
      { date: '2024-01-02', actual: null, garch: 0.46, lstm: null },
    ]);
  });
});

describe('VolatilityChart', () => {
  it('mounts with its heading', () => {
    render(<VolatilityChart overlay={overlayOf(actual, garch)} />);
    expect(screen.getByText('Volatility Forecast vs Actual')).toBeTruthy();
  });
});
