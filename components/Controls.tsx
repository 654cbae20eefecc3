import React from 'react';
import { SlidersHorizontal, CalendarRange, RotateCcw } from 'lucide-react';
import { DateRange, DisplayToggles } from '../types';

interface ControlsProps {
  bounds: DateRange;
  range: DateRange;
  toggles: DisplayToggles;
  onRangeChange: (r: DateRange) => void;
  onReset: () => void;
  onTogglesChange: (patch: Partial<DisplayToggles>) => void;
}

const Controls: React.FC<ControlsProps> = ({ bounds, range, toggles, onRangeChange, onReset, onTogglesChange }) => {
  return (
    <div className="bg-white rounded-lg shadow p-6">
      <div className="flex items-center mb-4 pb-4 border-b border-slate-100">
        <SlidersHorizontal className="w-5 h-5 text-slate-500 mr-2" />
        <h2 className="text-lg font-bold text-slate-800">Dashboard Controls</h2>
      </div>

      <div className="space-y-6">
        {/* Date Range */}
        <div>
          <label className="block text-sm font-medium text-slate-700 mb-2 flex items-center">
            <CalendarRange className="w-4 h-4 mr-1" />
            Select Date Range
          </label>
          <div className="flex space-x-2">
            <input
              type="date"
              aria-label="Start date"
              min={bounds.start}
              max={bounds.end}
              value={range.start}
              onChange={e => e.target.value && onRangeChange({ start: e.target.value, end: range.end })}
              className="w-1/2 border-slate-300 rounded-md shadow-sm p-2 border"
            />
            <input
              type="date"
              aria-label="End date"
              min={bounds.start}
              max={bounds.end}
              value={range.end}
              onChange={e => e.target.value && onRangeChange({ start: range.start, end: e.target.value })}
              className="w-1/2 border-slate-300 rounded-md shadow-sm p-2 border"
            />
          </div>
          <div className="flex items-center justify-between mt-1">
            <p className="text-xs text-slate-500">
              Available: {bounds.start} to {bounds.end}
            </p>
            <button onClick={onReset} className="flex items-center text-xs text-blue-600 hover:text-blue-800">
              <RotateCcw className="w-3 h-3 mr-1" />
              Full range
            </button>
          </div>
        </div>

        {/* Model Toggles */}
        <div className="space-y-2">
          <label className="flex items-center text-sm text-slate-700 cursor-pointer">
            <input
              type="checkbox"
              checked={toggles.showGarch}
              onChange={e => onTogglesChange({ showGarch: e.target.checked })}
              className="mr-2"
            />
            Show GARCH Forecast
          </label>
          <label className="flex items-center text-sm text-slate-700 cursor-pointer">
            <input
              type="checkbox"
              checked={toggles.showLstm}
              onChange={e => onTogglesChange({ showLstm: e.target.checked })}
              className="mr-2"
            />
            Show LSTM+GARCH Forecast
          </label>
        </div>
      </div>
    </div>
  );
};

export default Controls;
