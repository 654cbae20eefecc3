import React from 'react';
import { Activity, AlertCircle, AlertTriangle, Info, Loader2 } from 'lucide-react';
import Controls from './components/Controls';
import MetricsPanel from './components/MetricsPanel';
import VolatilityChart from './components/VolatilityChart';
import ErrorHistograms from './components/ErrorHistograms';
import DataTable from './components/DataTable';
import DataSourcePicker from './components/DataSourcePicker';
import { useDashboard } from './hooks/useDashboard';
import { DashboardController } from './services/dashboardController';
import { DEFAULT_SOURCE_URL } from './services/config';

interface AppProps {
  controller?: DashboardController;
  initialUrl?: string | null;
}

const EmptyNotice: React.FC<{ message: string }> = ({ message }) => (
  <div className="bg-blue-50 p-4 rounded-lg border border-blue-100 text-sm text-blue-700 flex items-center">
    <Info className="w-4 h-4 mr-2" />
    {message}
  </div>
);

const App: React.FC<AppProps> = ({ controller, initialUrl = DEFAULT_SOURCE_URL }) => {
  const { state, loadSource, reload, setDateRange, resetDateRange, setToggles } = useDashboard(initialUrl, controller);

  const renderBody = () => {
    switch (state.status) {
      case 'loading':
        return (
          <div className="flex items-center justify-center py-24 text-slate-500" role="status">
            <Loader2 className="w-6 h-6 mr-2 animate-spin text-blue-500" />
            Loading forecast data...
          </div>
        );

      case 'load-error':
        return (
          <div className="p-4 bg-red-50 border border-red-200 rounded-md flex items-center text-red-700" role="alert">
            <AlertCircle className="w-5 h-5 mr-2" />
            {state.error.message}
          </div>
        );

      case 'empty':
      case 'ready':
        return (
          <div className="grid grid-cols-1 lg:grid-cols-12 gap-6">
            <aside className="lg:col-span-3 space-y-4">
              {state.bounds && state.range ? (
                <Controls
                  bounds={state.bounds}
                  range={state.range}
                  toggles={state.toggles}
                  onRangeChange={setDateRange}
                  onReset={resetDateRange}
                  onTogglesChange={setToggles}
                />
              ) : (
                <EmptyNotice message="The loaded file has no dated rows." />
              )}
            </aside>

            <section className="lg:col-span-9 space-y-6">
              {state.droppedRows > 0 && (
                <div className="p-3 bg-amber-50 border border-amber-200 rounded-md flex items-center text-amber-800 text-sm">
                  <AlertTriangle className="w-4 h-4 mr-2" />
                  Skipped {state.droppedRows} row(s) with unparsable dates.
                </div>
              )}

              {state.status === 'empty' ? (
                <>
                  <MetricsPanel metrics={{ status: 'no-data' }} />
                  <EmptyNotice message="No data in selected date range to display charts." />
                  <EmptyNotice message="No rows in selected date range." />
                </>
              ) : (
                <>
                  <MetricsPanel metrics={state.metrics} />
                  <VolatilityChart overlay={state.charts.overlay} />
                  <ErrorHistograms histograms={state.charts.errorHistograms} />
                  <DataTable rows={state.rows} />
                </>
              )}
            </section>
          </div>
        );
    }
  };

  return (
    <div className="min-h-screen bg-slate-50 pb-12 font-inter">
      <header className="bg-white shadow-sm border-b border-slate-200 sticky top-0 z-20">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 h-16 flex items-center">
          <div className="bg-blue-600 p-2 rounded-lg mr-3">
            <Activity className="w-6 h-6 text-white" />
          </div>
          <div>
            <h1 className="text-xl font-bold text-slate-800">Crypto Volatility Forecasting Dashboard</h1>
            <p className="text-xs text-slate-500">Hybrid GARCH + LSTM model, 7-day BTC volatility</p>
          </div>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8 space-y-6">
        <DataSourcePicker
          currentLabel={state.sourceLabel}
          loading={state.status === 'loading'}
          onLoad={loadSource}
          onReload={reload}
        />
        {renderBody()}
      </main>

      <footer className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 text-xs text-slate-400 border-t border-slate-200 pt-4">
        Forecasts are precomputed upstream; this dashboard only compares them against realized volatility.
      </footer>
    </div>
  );
};

export default App;
