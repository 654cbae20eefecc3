import React, { useState } from 'react';
import Papa from 'papaparse';
import { ForecastRecord } from '../types';
import { ArrowUpDown, Download, Table } from 'lucide-react';
import { REQUIRED_COLUMNS, TABLE_DECIMALS } from '../services/config';
import { formatValue } from '../services/format';

interface DataTableProps {
  rows: ForecastRecord[];
}

type SortKey = keyof ForecastRecord;

const COLUMNS: { key: SortKey; label: string }[] = [
  { key: 'date', label: REQUIRED_COLUMNS.date },
  { key: 'actualVolatility', label: REQUIRED_COLUMNS.actual },
  { key: 'garchVolatility', label: REQUIRED_COLUMNS.garch },
  { key: 'predictedVolatility', label: REQUIRED_COLUMNS.predicted },
];

// Absent values always sort last.
export const sortRows = (rows: ForecastRecord[], key: SortKey, direction: 'asc' | 'desc'): ForecastRecord[] => {
  const sign = direction === 'asc' ? 1 : -1;
  return [...rows].sort((a, b) => {
    const va = a[key];
    const vb = b[key];
    if (va === vb) return 0;
    if (va === null) return 1;
    if (vb === null) return -1;
    const diff = typeof va === 'number' && typeof vb === 'number' ? va - vb : String(va).localeCompare(String(vb));
    return diff * sign;
  });
};

const csvCell = (v: number | null) => (v === null ? '' : v.toFixed(TABLE_DECIMALS));

export const toCsv = (rows: ForecastRecord[]): string =>
  Papa.unparse({
    fields: COLUMNS.map(c => c.label),
    data: rows.map(r => [
      r.date,
      csvCell(r.actualVolatility),
      csvCell(r.garchVolatility),
      csvCell(r.predictedVolatility),
    ]),
  });

const DataTable: React.FC<DataTableProps> = ({ rows }) => {
  const [sortConfig, setSortConfig] = useState<{ key: SortKey; direction: 'asc' | 'desc' } | null>(null);

  const sortedRows = React.useMemo(
    () => (sortConfig ? sortRows(rows, sortConfig.key, sortConfig.direction) : rows),
    [rows, sortConfig]
  );

  const requestSort = (key: SortKey) => {
    let direction: 'asc' | 'desc' = 'asc';
    if (sortConfig && sortConfig.key === key && sortConfig.direction === 'asc') {
      direction = 'desc';
    }
    setSortConfig({ key, direction });
  };

  const exportCSV = () => {
    const blob = new Blob(['\uFEFF' + toCsv(sortedRows)], { type: 'text/csv;charset=utf-8' });
    const url = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.setAttribute('href', url);
    link.setAttribute('download', 'volatility_forecast_filtered.csv');
    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(url);
  };

  return (
    <div className="bg-white shadow rounded-lg overflow-hidden">
      <div className="p-4 border-b border-slate-100 flex justify-between items-center bg-slate-50">
        <h3 className="font-semibold text-slate-800 flex items-center">
          <Table className="w-5 h-5 text-blue-600 mr-2" />
          Raw Forecast Data (Filtered)
          <span className="ml-2 text-xs text-slate-500 font-normal">{rows.length} rows</span>
        </h3>
        <button
          onClick={exportCSV}
          className="flex items-center px-3 py-1.5 bg-blue-600 text-white text-sm rounded hover:bg-blue-700 transition"
        >
          <Download className="w-4 h-4 mr-1" />
          Export CSV
        </button>
      </div>
      <div className="overflow-x-auto max-h-[480px] overflow-y-auto">
        <table className="min-w-full divide-y divide-slate-200">
          <thead className="bg-slate-50 sticky top-0">
            <tr>
              {COLUMNS.map(c => (
                <th
                  key={c.key}
                  onClick={() => requestSort(c.key)}
                  className="px-6 py-3 text-left text-xs font-medium text-slate-500 uppercase tracking-wider cursor-pointer hover:bg-slate-100"
                >
                  <div className="flex items-center">{c.label} <ArrowUpDown className="w-3 h-3 ml-1" /></div>
                </th>
              ))}
            </tr>
          </thead>
          <tbody className="bg-white divide-y divide-slate-200">
            {sortedRows.map(row => (
              <tr key={row.date} className="hover:bg-slate-50 transition">
                <td className="px-6 py-2 whitespace-nowrap text-sm text-slate-900 font-medium">{row.date}</td>
                <td className="px-6 py-2 whitespace-nowrap text-sm font-mono text-blue-700">{formatValue(row.actualVolatility)}</td>
                <td className="px-6 py-2 whitespace-nowrap text-sm font-mono text-green-700">{formatValue(row.garchVolatility)}</td>
                <td className="px-6 py-2 whitespace-nowrap text-sm font-mono text-red-700">{formatValue(row.predictedVolatility)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
};

export default DataTable;
