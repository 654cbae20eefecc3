import {
  ChartBundle,
  DateRange,
  DisplayToggles,
  ForecastDataset,
  ForecastRecord,
  MetricsSummary,
} from '../types';
import { composeCharts } from './chartComposer';
import { DataSource, DatasetLoader, sourceLabel } from './datasetLoader';
import { DashboardErrorKind, isDashboardError } from './errors';
import { clampDateRange, filterByDateRange, getDateBounds } from './filterEngine';
import { createLogger } from './logger';
import { computeMetrics } from './metrics';

export const DEFAULT_TOGGLES: DisplayToggles = { showGarch: true, showLstm: true };

export interface PassContext {
  sourceLabel: string;
  bounds: DateRange | null;
  range: DateRange | null;
  toggles: DisplayToggles;
  totalRows: number;
  droppedRows: number;
}

export interface ReadyState extends PassContext {
  status: 'ready';
  rows: ForecastRecord[];
  metrics: MetricsSummary;
  charts: ChartBundle;
}

export interface EmptyState extends PassContext {
  status: 'empty';
}

export type LoadErrorKind = DashboardErrorKind | 'unexpected';

export type DashboardState =
  | { status: 'loading'; sourceLabel: string }
  | { status: 'load-error'; sourceLabel: string; error: { kind: LoadErrorKind; message: string } }
  | ReadyState
  | EmptyState;

type Listener = (state: DashboardState) => void;

const log = createLogger('Dashboard');

/**
 * Drives the dashboard: one load per source, then one synchronous
 * filter -> metrics -> charts -> rows pass per user event.
 */
export class DashboardController {
  private state: DashboardState = { status: 'loading', sourceLabel: '' };
  private listeners = new Set<Listener>();
  private dataset: ForecastDataset | null = null;
  private bounds: DateRange | null = null;
  private range: DateRange | null = null;
  private toggles: DisplayToggles;
  private lastSource: DataSource | null = null;
  private label = '';
  private loadSeq = 0;

  constructor(
    private readonly loader: DatasetLoader = new DatasetLoader(),
    toggles: DisplayToggles = DEFAULT_TOGGLES
  ) {
    this.toggles = { ...toggles };
  }

  // Arrow properties so React can take them unbound.
  getState = (): DashboardState => this.state;

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  async load(source: DataSource): Promise<void> {
    const seq = ++this.loadSeq;
    const label = sourceLabel(source);
    this.lastSource = source;
    this.label = label;
    this.dataset = null;
    this.setState({ status: 'loading', sourceLabel: label });

    let dataset: ForecastDataset;
    try {
      dataset = await this.loader.load(source);
    } catch (err) {
      if (!isDashboardError(err)) {
        log.error(`Unexpected failure loading '${label}'`, err);
        if (seq === this.loadSeq) {
          this.setState({
            status: 'load-error',
            sourceLabel: label,
            error: { kind: 'unexpected', message: `Could not load '${label}'.` },
          });
        }
        throw err;
      }
      if (seq !== this.loadSeq) return;
      log.error(err.message);
      this.setState({
        status: 'load-error',
        sourceLabel: label,
        error: { kind: err.kind, message: err.message },
      });
      return;
    }

    // A newer load started while this one was in flight.
    if (seq !== this.loadSeq) return;

    this.dataset = dataset;
    this.bounds = getDateBounds(dataset.records);
    this.range = this.bounds;
    this.runPass();
  }

  reload(): Promise<void> {
    return this.lastSource ? this.load(this.lastSource) : Promise.resolve();
  }

  setDateRange(range: DateRange) {
    if (!this.dataset || !this.bounds) return;
    this.range = clampDateRange(range, this.bounds);
    this.runPass();
  }

  resetDateRange() {
    if (!this.dataset) return;
    this.range = this.bounds;
    this.runPass();
  }

  setToggles(patch: Partial<DisplayToggles>) {
    if (!this.dataset) return;
    this.toggles = { ...this.toggles, ...patch };
    this.runPass();
  }

  private runPass() {
    const dataset = this.dataset;
    if (!dataset) return;

    const context: PassContext = {
      sourceLabel: this.label,
      bounds: this.bounds,
      range: this.range,
      toggles: this.toggles,
      totalRows: dataset.records.length,
      droppedRows: dataset.droppedRows,
    };

    const rows = this.range ? filterByDateRange(dataset.records, this.range) : [];
    if (rows.length === 0) {
      this.setState({ status: 'empty', ...context });
      return;
    }

    this.setState({
      status: 'ready',
      ...context,
      rows,
      metrics: computeMetrics(rows),
      charts: composeCharts(rows, this.toggles),
    });
  }

  private setState(next: DashboardState) {
    this.state = next;
    this.listeners.forEach(l => l(next));
  }
}
