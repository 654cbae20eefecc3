import { describe, it, expect } from '@jest/globals';
import { parseForecastCsv, toIsoDay, toNumber } from './csvParser';
import { SchemaError } from './errors';
import { HEADER } from './__fixtures__/forecasts';

describe('toIsoDay', () => {
  it.each([
    ['2024-01-05', '2024-01-05'],
    ['2024-01-05 00:00:00', '2024-01-05'],
    ['2024-01-05T13:30:00', '2024-01-05'],
    ['2024/01/05', '2024-01-05'],
    ['01/15/2024', '2024-01-15'],
  ])('reads %s', (input, expected) => {
    expect(toIsoDay(input)).toBe(expected);
  });

  it.each(['', '   ', 'not-a-date', '2024-13-45'])('rejects %p', input => {
    expect(toIsoDay(input)).toBeNull();
  });

  it('rejects a missing cell', () => {
    expect(toIsoDay(undefined)).toBeNull();
  });

  // Offsets east and west of UTC catch a shift in any local time zone.
  it.each([
    ['2024-01-05 00:00:00+00:00', '2024-01-05'],
    ['2024-01-05T00:00:00Z', '2024-01-05'],
    ['2024-01-05T00:00:00.000Z', '2024-01-05'],
    ['2024-01-05 01:00:00+05:30', '2024-01-05'],
    ['2024-01-05T23:30:00-05:00', '2024-01-05'],
    ['2024-01-05T23:30:00 -0500', '2024-01-05'],
  ])('keeps the written day of %s', (input, expected) => {
    expect(toIsoDay(input)).toBe(expected);
  });
});

describe('toNumber', () => {
  it('parses numeric text and nulls the rest', () => {
    expect(toNumber(' 0.25 ')).toBe(0.25);
    expect(toNumber('')).toBeNull();
    expect(toNumber('abc')).toBeNull();
    expect(toNumber(undefined)).toBeNull();
  });
});

describe('parseForecastCsv', () => {
  it('maps rows to forecast records in file order', () => {
    const csv = `${HEADER}\n2024-01-02,0.5,0.6,0.55\n2024-01-01 00:00:00,0.4,0.45,0.42\n`;
    const { records, droppedRows } = parseForecastCsv(csv);
    expect(droppedRows).toBe(0);
    expect(records).toEqual([
      { date: '2024-01-02', actualVolatility: 0.5, garchVolatility: 0.6, predictedVolatility: 0.55 },
      { date: '2024-01-01', actualVolatility: 0.4, garchVolatility: 0.45, predictedVolatility: 0.42 },
    ]);
  });

  it('keeps the calendar day of offset-stamped dates', () => {
    const csv = `${HEADER}\n2024-01-01 00:00:00+00:00,1,1,1\n2024-01-02 00:00:00+00:00,2,2,2\n`;
    expect(parseForecastCsv(csv).records.map(r => r.date)).toEqual(['2024-01-01', '2024-01-02']);
  });

  it('drops rows with unparsable dates and counts them', () => {
    const csv = `${HEADER}\nnot-a-date,1,1,1\n2024-01-03,0.3,0.3,0.3\n,1,1,1\n`;
    const { records, droppedRows } = parseForecastCsv(csv);
    expect(droppedRows).toBe(2);
    expect(records.map(r => r.date)).toEqual(['2024-01-03']);
  });

  it('keeps rows with non-numeric values as gaps', () => {
    const csv = `${HEADER}\n2024-01-03,0.3,n/a,\n`;
    expect(parseForecastCsv(csv).records).toEqual([
      { date: '2024-01-03', actualVolatility: 0.3, garchVolatility: null, predictedVolatility: null },
    ]);
  });

  it('ignores a BOM, padded headers and extra columns', () => {
    const csv = '\uFEFF Date , Actual_Volatility,GARCH_Volatility,Predicted_Volatility,Note\n2024-01-03,0.3,0.2,0.1,x\n';
    expect(parseForecastCsv(csv).records).toHaveLength(1);
  });

  it('reports missing required columns', () => {
    const csv = 'Date,Actual_Volatility,Predicted_Volatility\n2024-01-03,0.3,0.1\n';
    let caught: unknown;
    try {
      parseForecastCsv(csv);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught instanceof SchemaError && caught.missingColumns).toEqual(['GARCH_Volatility']);
  });

  it('rejects a file without a header row', () => {
    expect(() => parseForecastCsv('')).toThrow(SchemaError);
  });
});
