import { ForecastRecord, MetricsSummary } from '../types';
import { residuals, rmse } from './mathUtils';

/**
 * RMSE of each model against actual volatility, plus how much the hybrid
 * model improves on GARCH. A zero GARCH RMSE reports 0% improvement.
 */
export const computeMetrics = (subset: readonly ForecastRecord[]): MetricsSummary => {
  if (subset.length === 0) return { status: 'no-data' };

  const actual = subset.map(r => r.actualVolatility);
  const garch = subset.map(r => r.garchVolatility);
  const lstm = subset.map(r => r.predictedVolatility);

  const rmseGarch = rmse(actual, garch);
  const rmseLstm = rmse(actual, lstm);

  return {
    status: 'ok',
    rmseGarch,
    rmseLstm,
    improvementPct: improvementPct(rmseGarch, rmseLstm),
    samples: {
      garch: residuals(actual, garch).length,
      lstm: residuals(actual, lstm).length,
    },
  };
};

export const improvementPct = (rmseGarch: number | null, rmseLstm: number | null): number | null => {
  if (rmseGarch === null || rmseLstm === null) return null;
  if (rmseGarch === 0) return 0;
  return ((rmseGarch - rmseLstm) / rmseGarch) * 100;
};
