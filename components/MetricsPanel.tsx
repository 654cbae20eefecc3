import React from 'react';
import { BarChart3, Target, TrendingUp, TrendingDown, Info } from 'lucide-react';
import { MetricsSummary } from '../types';
import { formatMetric, formatPct } from '../services/format';

interface MetricsPanelProps {
  metrics: MetricsSummary;
}

const NO_DATA = 'No data in selected date range.';

const Card: React.FC<{ title: string; value: string; delta?: React.ReactNode }> = ({ title, value, delta }) => (
  <div className="bg-white p-5 rounded-lg shadow border border-slate-200" data-testid="metric-card">
    <p className="text-sm font-medium text-slate-500">{title}</p>
    <p className="text-2xl font-bold text-slate-800 mt-1 font-mono">{value}</p>
    {delta && <div className="text-xs mt-1">{delta}</div>}
  </div>
);

const Placeholder: React.FC<{ title: string }> = ({ title }) => (
  <div className="bg-blue-50 p-5 rounded-lg border border-blue-100" data-testid="metric-card">
    <p className="text-sm font-medium text-slate-500">{title}</p>
    <p className="text-sm text-blue-700 mt-2 flex items-center">
      <Info className="w-4 h-4 mr-1" />
      {NO_DATA}
    </p>
  </div>
);

const MetricsPanel: React.FC<MetricsPanelProps> = ({ metrics }) => {
  return (
    <div>
      <h3 className="text-lg font-semibold text-slate-800 flex items-center mb-3">
        <BarChart3 className="w-5 h-5 mr-2 text-blue-500" />
        Model Performance at a Glance
      </h3>
      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        {metrics.status === 'no-data' ? (
          <>
            <Placeholder title="GARCH RMSE" />
            <Placeholder title="LSTM+GARCH RMSE" />
            <Placeholder title="Improvement" />
          </>
        ) : (
          <>
            <Card title="GARCH RMSE" value={formatMetric(metrics.rmseGarch)} />
            <Card
              title="LSTM+GARCH RMSE"
              value={formatMetric(metrics.rmseLstm)}
              delta={
                metrics.improvementPct !== null && (
                  <span className={`flex items-center ${metrics.improvementPct >= 0 ? 'text-green-600' : 'text-red-600'}`}>
                    {metrics.improvementPct >= 0 ? <TrendingUp className="w-3 h-3 mr-1" /> : <TrendingDown className="w-3 h-3 mr-1" />}
                    {formatPct(metrics.improvementPct)}
                    <Target className="w-3 h-3 ml-1" />
                  </span>
                )
              }
            />
            <Card
              title="Improvement"
              value={formatPct(metrics.improvementPct)}
              delta={<span className="text-slate-500">vs GARCH</span>}
            />
          </>
        )}
      </div>
    </div>
  );
};

export default MetricsPanel;
