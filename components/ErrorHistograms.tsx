import React from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import { BarChartHorizontal, Info } from 'lucide-react';
import { HistogramResult, HistogramSpec, ModelKey } from '../types';

interface ErrorHistogramsProps {
  histograms: Record<ModelKey, HistogramResult>;
}

const MODELS: ModelKey[] = ['garch', 'lstm'];

const HistogramCard: React.FC<{ spec: HistogramSpec }> = ({ spec }) => {
  const data = spec.bins.map(b => ({
    mid: ((b.x0 + b.x1) / 2).toFixed(4),
    range: `${b.x0.toFixed(4)} to ${b.x1.toFixed(4)}`,
    count: b.count,
  }));

  return (
    <div className="bg-white p-6 rounded-lg shadow border border-slate-200">
      <h4 className="font-semibold text-slate-700 mb-2">{spec.title}</h4>
      <div className="h-64">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={data} barCategoryGap={1}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#E2E8F0" />
            <XAxis dataKey="mid" stroke="#64748B" fontSize={10} minTickGap={20} />
            <YAxis allowDecimals={false} stroke="#64748B" fontSize={12} />
            <Tooltip labelFormatter={(_, payload) => payload?.[0]?.payload?.range ?? ''} />
            <Bar dataKey="count" name="Days" fill={spec.color} isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      </div>
      <p className="text-xs text-slate-400 mt-1">{spec.total} residuals, actual minus forecast</p>
    </div>
  );
};

const NoHistogram: React.FC<{ message: string }> = ({ message }) => (
  <div className="bg-blue-50 p-6 rounded-lg border border-blue-100 text-sm text-blue-700 flex items-center">
    <Info className="w-4 h-4 mr-2" />
    {message}
  </div>
);

// Both distributions show regardless of the line toggles.
const ErrorHistograms: React.FC<ErrorHistogramsProps> = ({ histograms }) => {
  const hasData = MODELS.some(model => histograms[model].status === 'ok');

  return (
    <div>
      <h3 className="text-lg font-semibold text-slate-800 flex items-center mb-3">
        <BarChartHorizontal className="w-5 h-5 mr-2 text-orange-500" />
        Forecast Error Distribution
      </h3>
      {!hasData ? (
        <NoHistogram message="No data in selected date range to display error distribution." />
      ) : (
        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
          {MODELS.map(model => {
            const h = histograms[model];
            return h.status === 'ok'
              ? <HistogramCard key={model} spec={h} />
              : <NoHistogram key={model} message={`No ${model === 'garch' ? 'GARCH' : 'LSTM+GARCH'} forecasts in selected date range.`} />;
          })}
        </div>
      )}
    </div>
  );
};

export default ErrorHistograms;
