import { useEffect, useState } from 'react';
import { describeError, fetchDashboard, isCancelled } from '../lib/api';
import type { DashboardParams, DashboardResult, ProjectionMode } from '../lib/types';
import { useDebouncedValue } from './useDebouncedValue';

export interface DashboardState {
  data: DashboardResult | null;
  loading: boolean;
  error: string | null;
}

/**
 * Recomputes the dashboard whenever the parameters settle. A newer request
 * aborts the one still in flight.
 */
export function useDashboard(params: DashboardParams | null, projectionMode: ProjectionMode): DashboardState {
  const [data, setData] = useState<DashboardResult | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const debounced = useDebouncedValue(params);

  useEffect(() => {
    if (!debounced) {
      return;
    }

    const controller = new AbortController();
    setLoading(true);

    fetchDashboard(debounced, projectionMode, controller.signal)
      .then((result) => {
        setData(result);
        setError(null);
        setLoading(false);
      })
      .catch((err: unknown) => {
        if (isCancelled(err)) return;
        console.error('Failed to compute dashboard:', err);
        setError(describeError(err, 'Failed to compute dashboard'));
        setLoading(false);
      });

    return () => controller.abort();
  }, [debounced, projectionMode]);

  return { data, loading, error };
}
