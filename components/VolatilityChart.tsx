import React, { useMemo } from 'react';
import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import { Activity } from 'lucide-react';
import { OverlayChartSpec } from '../types';
import { CHART_HEIGHT } from '../services/config';

interface VolatilityChartProps {
  overlay: OverlayChartSpec;
}

type ChartRow = { date: string } & Record<string, number | string | null>;

// Series share subset order, so points line up by index.
export const toChartRows = (overlay: OverlayChartSpec): ChartRow[] => {
  const first = overlay.series[0];
  if (!first) return [];
  return first.points.map((p, i) => {
    const row: ChartRow = { date: p.date };
    overlay.series.forEach(s => {
      row[s.key] = s.points[i]?.value ?? null;
    });
    return row;
  });
};

const VolatilityChart: React.FC<VolatilityChartProps> = ({ overlay }) => {
  const data = useMemo(() => toChartRows(overlay), [overlay]);

  return (
    <div className="bg-white p-6 rounded-lg shadow border border-slate-200">
      <h3 className="text-lg font-semibold text-slate-800 flex items-center mb-4">
        <Activity className="w-5 h-5 mr-2 text-blue-500" />
        Volatility Forecast vs Actual
      </h3>
      <div style={{ height: CHART_HEIGHT }}>
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={data}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#E2E8F0" />
            <XAxis
              dataKey="date"
              stroke="#64748B"
              fontSize={12}
              minTickGap={30}
              label={{ value: overlay.xLabel, position: 'insideBottom', offset: -2 }}
            />
            <YAxis
              stroke="#64748B"
              fontSize={12}
              label={{ value: overlay.yLabel, angle: -90, position: 'insideLeft' }}
            />
            <Tooltip
              contentStyle={{ backgroundColor: '#fff', borderRadius: '8px', border: '1px solid #e2e8f0' }}
              formatter={v => (typeof v === 'number' ? v.toFixed(4) : v)}
            />
            <Legend verticalAlign="top" align="right" />
            {overlay.series.map(s => (
              <Line
                key={s.key}
                type="monotone"
                dataKey={s.key}
                name={s.name}
                stroke={s.color}
                strokeWidth={s.strokeWidth}
                strokeDasharray={s.dashed ? '2 4' : undefined}
                dot={false}
                isAnimationActive={false}
              />
            ))}
          </LineChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default VolatilityChart;
