import { useCallback, useEffect, useState, useSyncExternalStore } from 'react';
import { DateRange, DisplayToggles } from '../types';
import { DashboardController } from '../services/dashboardController';
import { DataSource } from '../services/datasetLoader';
import { createLogger } from '../services/logger';

const log = createLogger('useDashboard');

/**
 * Binds a DashboardController to React. Loads `initialUrl` on mount; every
 * returned action maps to exactly one controller event.
 */
export const useDashboard = (initialUrl: string | null, injected?: DashboardController) => {
  const [controller] = useState(() => injected ?? new DashboardController());
  const state = useSyncExternalStore(controller.subscribe, controller.getState, controller.getState);

  const loadSource = useCallback((source: DataSource) => {
    controller.load(source).catch(err => log.error('Load aborted', err));
  }, [controller]);

  useEffect(() => {
    if (initialUrl) loadSource({ kind: 'url', url: initialUrl });
  }, [initialUrl, loadSource]);

  const reload = useCallback(() => {
    controller.reload().catch(err => log.error('Reload aborted', err));
  }, [controller]);

  const setDateRange = useCallback((range: DateRange) => controller.setDateRange(range), [controller]);
  const resetDateRange = useCallback(() => controller.resetDateRange(), [controller]);
  const setToggles = useCallback((patch: Partial<DisplayToggles>) => controller.setToggles(patch), [controller]);

  return { state, loadSource, reload, setDateRange, resetDateRange, setToggles };
};
