import React, { useRef, useState } from 'react';
import { Upload, Server, HardDrive, RefreshCw, Link as LinkIcon } from 'lucide-react';
import { DataSource } from '../services/datasetLoader';
import { DEFAULT_SOURCE_URL } from '../services/config';

interface DataSourcePickerProps {
  currentLabel: string;
  loading: boolean;
  onLoad: (source: DataSource) => void;
  onReload: () => void;
}

const DataSourcePicker: React.FC<DataSourcePickerProps> = ({ currentLabel, loading, onLoad, onReload }) => {
  const [mode, setMode] = useState<'url' | 'local'>('url');
  const [url, setUrl] = useState<string>(DEFAULT_SOURCE_URL);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const handleFileChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;
    onLoad({ kind: 'file', file });
    // Allow picking the same file again after it changes on disk.
    e.target.value = '';
  };

  const tabClass = (active: boolean) =>
    `flex items-center px-4 py-2 font-medium text-sm transition-colors border-b-2 ${
      active ? 'border-blue-600 text-blue-600' : 'border-transparent text-slate-500 hover:text-slate-700'
    }`;

  return (
    <div className="bg-white rounded-lg shadow p-6">
      <div className="flex border-b border-slate-200 mb-4">
        <button onClick={() => setMode('url')} className={tabClass(mode === 'url')}>
          <Server className="w-4 h-4 mr-2" />
          Server CSV
        </button>
        <button onClick={() => setMode('local')} className={tabClass(mode === 'local')}>
          <HardDrive className="w-4 h-4 mr-2" />
          Local file
        </button>
      </div>

      {mode === 'url' ? (
        <div className="flex items-center space-x-2">
          <LinkIcon className="w-4 h-4 text-slate-400" />
          <input
            type="text"
            aria-label="CSV URL"
            value={url}
            onChange={e => setUrl(e.target.value)}
            className="flex-1 border-slate-300 rounded px-2 py-1.5 border text-sm"
          />
          <button
            onClick={() => url.trim() && onLoad({ kind: 'url', url: url.trim() })}
            disabled={loading}
            className="bg-blue-600 text-white px-3 py-1.5 rounded text-sm hover:bg-blue-700 disabled:opacity-50"
          >
            Load
          </button>
        </div>
      ) : (
        <div
          className="border-2 border-dashed border-slate-300 rounded-lg p-6 flex flex-col items-center bg-white hover:bg-slate-50 transition cursor-pointer"
          onClick={() => fileInputRef.current?.click()}
        >
          <Upload className="w-6 h-6 text-blue-500 mb-2" />
          <p className="text-sm font-semibold text-slate-700">Click to pick a forecast CSV</p>
          <p className="text-xs text-slate-400 mt-1">Date, Actual_Volatility, GARCH_Volatility, Predicted_Volatility</p>
          <input type="file" ref={fileInputRef} onChange={handleFileChange} accept=".csv" className="hidden" />
        </div>
      )}

      <div className="mt-3 flex items-center justify-between text-xs text-slate-400">
        <span className="truncate">Source: {currentLabel || '—'}</span>
        <button onClick={onReload} disabled={loading} className="flex items-center hover:text-blue-600 disabled:opacity-50">
          <RefreshCw className={`w-3 h-3 mr-1 ${loading ? 'animate-spin' : ''}`} />
          Reload
        </button>
      </div>
    </div>
  );
};

export default DataSourcePicker;
