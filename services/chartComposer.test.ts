import { describe, it, expect } from '@jest/globals';
import { composeCharts, composeErrorHistogram } from './chartComposer';
import { makeRecords } from './__fixtures__/forecasts';

const subset = makeRecords(5);

describe('composeCharts', () => {
  it('draws only actual volatility when both forecasts are hidden', () => {
    const { overlay } = composeCharts(subset, { showGarch: false, showLstm: false });
    expect(overlay.series.map(s => s.key)).toEqual(['actual']);
  });

  it('adds each forecast line with its toggle', () => {
    expect(composeCharts(subset, { showGarch: true, showLstm: false }).overlay.series.map(s => s.key))
      .toEqual(['actual', 'garch']);
    expect(composeCharts(subset, { showGarch: false, showLstm: true }).overlay.series.map(s => s.key))
      .toEqual(['actual', 'lstm']);
    expect(composeCharts(subset, { showGarch: true, showLstm: true }).overlay.series.map(s => s.key))
      .toEqual(['actual', 'garch', 'lstm']);
  });

  it('lists points in subset order with fixed axes and styles', () => {
    const { overlay } = composeCharts(subset, { showGarch: true, showLstm: true });
    expect(overlay.xLabel).toBe('Date');
    expect(overlay.yLabel).toBe('7-Day Volatility');

    const [actual, garch, lstm] = overlay.series;
    expect(actual.points).toEqual(subset.map(r => ({ date: r.date, value: r.actualVolatility })));
    expect(garch.points.map(p => p.value)).toEqual(subset.map(r => r.garchVolatility));
    expect(lstm.points.map(p => p.value)).toEqual(subset.map(r => r.predictedVolatility));
    expect([actual.name, garch.name, lstm.name]).toEqual(['Actual Volatility', 'GARCH Forecast', 'LSTM+GARCH Forecast']);
    expect(garch.dashed).toBe(true);
    expect(actual.strokeWidth).toBe(3);
  });

  it('builds both histograms even when the lines are hidden', () => {
    const { errorHistograms } = composeCharts(subset, { showGarch: false, showLstm: false });
    for (const h of [errorHistograms.garch, errorHistograms.lstm]) {
      expect(h.status).toBe('ok');
      if (h.status === 'ok') {
        expect(h.bins).toHaveLength(30);
        expect(h.total).toBe(5);
        expect(h.bins.reduce((n, b) => n + b.count, 0)).toBe(5);
      }
    }
  });

  it('marks histograms as no data for an empty subset', () => {
    const bundle = composeCharts([], { showGarch: true, showLstm: true });
    expect(bundle.errorHistograms).toEqual({ garch: { status: 'no-data' }, lstm: { status: 'no-data' } });
    expect(bundle.overlay.series.every(s => s.points.length === 0)).toBe(true);
  });
});

describe('composeErrorHistogram', () => {
  it('bins residuals actual minus forecast', () => {
    const records = [
      { date: '2024-01-01', actualVolatility: 1, garchVolatility: 0, predictedVolatility: 1 },
      { date: '2024-01-02', actualVolatility: 1, garchVolatility: 3, predictedVolatility: null },
    ];
    const h = composeErrorHistogram(records, 'garch', 2);
    expect(h).toEqual({
      status: 'ok',
      model: 'garch',
      title: 'GARCH Forecast Errors',
      color: '#16A34A',
      bins: [
        { x0: -2, x1: -0.5, count: 1 },
        { x0: -0.5, x1: 1, count: 1 },
      ],
      total: 2,
    });
  });

  it('is no data when a model has no complete pairs', () => {
    const records = [{ date: '2024-01-01', actualVolatility: 1, garchVolatility: 1, predictedVolatility: null }];
    expect(composeErrorHistogram(records, 'lstm')).toEqual({ status: 'no-data' });
  });
});
