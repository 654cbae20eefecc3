/**
 * @jest-environment jsdom
 */
import React from 'react';
import { describe, it, expect, beforeAll } from '@jest/globals';
import { fireEvent, render, screen } from '@testing-library/react';
import App from './App';
import { DashboardController } from './services/dashboardController';
import { DatasetLoader } from './services/datasetLoader';
import { setLogSilenced } from './services/logger';
import { createFakeFetch, csvOf, makeRecords } from './services/__fixtures__/forecasts';
import { installResizeObserver } from './components/__fixtures__/resizeObserver';

beforeAll(() => {
  setLogSilenced(true);
  installResizeObserver();
});

const makeController = () => {
  const all = makeRecords(8);
  const { fetchFn } = createFakeFetch({
    '/gap.csv': { body: csvOf([all[0], all[1], all[7]]) },
  });
  return new DashboardController(new DatasetLoader({ fetchFn }));
};

describe('App', () => {
  it('shows a spinner until data arrives', () => {
    render(<App controller={makeController()} initialUrl={null} />);
    expect(screen.getByRole('status').textContent).toBe('Loading forecast data...');
  });

  it('shows only the error when the source is missing', async () => {
    render(<App controller={makeController()} initialUrl="/missing.csv" />);

    const alert = await screen.findByRole('alert');
    expect(alert.textContent).toBe("Data file '/missing.csv' not found or unreadable.");
    expect(screen.queryByText('Model Performance at a Glance')).toBeNull();
    expect(screen.queryByText('Dashboard Controls')).toBeNull();
  });

  it('falls back to placeholders for an empty selection', async () => {
    const controller = makeController();
    await controller.load({ kind: 'url', url: '/gap.csv' });
    controller.setDateRange({ start: '2024-01-04', end: '2024-01-05' });

    render(<App controller={controller} initialUrl={null} />);

    expect(screen.getAllByText('No data in selected date range.')).toHaveLength(3);
    expect(screen.getByText('No rows in selected date range.')).toBeTruthy();
    expect(screen.getByLabelText('Start date')).toHaveProperty('value', '2024-01-04');
    expect(screen.getByLabelText('End date')).toHaveProperty('value', '2024-01-05');
  });

  it('shows metrics, chart, histograms and table once data is loaded', async () => {
    const controller = makeController();
    await controller.load({ kind: 'url', url: '/gap.csv' });

    render(<App controller={controller} initialUrl={null} />);

    expect(screen.getByText('Dashboard Controls')).toBeTruthy();
    expect(screen.getByText('Model Performance at a Glance')).toBeTruthy();
    expect(screen.getByText('Volatility Forecast vs Actual')).toBeTruthy();
    expect(screen.getByText('GARCH Forecast Errors')).toBeTruthy();
    expect(screen.getByText('LSTM+GARCH Forecast Errors')).toBeTruthy();
    expect(screen.getByText('3 rows')).toBeTruthy();
    expect(screen.queryByText('No rows in selected date range.')).toBeNull();
  });

  it('keeps both histograms with every forecast line hidden', async () => {
    const controller = makeController();
    await controller.load({ kind: 'url', url: '/gap.csv' });

    render(<App controller={controller} initialUrl={null} />);
    fireEvent.click(screen.getByLabelText('Show GARCH Forecast'));
    fireEvent.click(screen.getByLabelText('Show LSTM+GARCH Forecast'));

    expect(controller.getState().status).toBe('ready');
    expect(screen.getByText('GARCH Forecast Errors')).toBeTruthy();
    expect(screen.getByText('LSTM+GARCH Forecast Errors')).toBeTruthy();
  });

  it('routes toggle clicks to the controller', async () => {
    const controller = makeController();
    await controller.load({ kind: 'url', url: '/gap.csv' });
    controller.setDateRange({ start: '2024-01-04', end: '2024-01-05' });

    render(<App controller={controller} initialUrl={null} />);
    fireEvent.click(screen.getByLabelText('Show GARCH Forecast'));

    const state = controller.getState();
    expect(state.status).toBe('empty');
    expect(state.status === 'empty' && state.toggles).toEqual({ showGarch: false, showLstm: true });
    expect(screen.getByLabelText('Show GARCH Forecast')).toHaveProperty('checked', false);
  });
});
