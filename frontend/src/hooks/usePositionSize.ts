import { useEffect, useState } from 'react';
import { describeError, fetchPositionSize, isCancelled } from '../lib/api';
import type { PositionSizeResult, SizingParams } from '../lib/types';
import { useDebouncedValue } from './useDebouncedValue';

export function usePositionSize(params: SizingParams | null) {
  const [result, setResult] = useState<PositionSizeResult | null>(null);
  const [error, setError] = useState<string | null>(null);
  const debounced = useDebouncedValue(params);

  useEffect(() => {
    if (!debounced) {
      return;
    }

    const controller = new AbortController();

    fetchPositionSize(debounced, controller.signal)
      .then((sized) => {
        setResult(sized);
        setError(null);
      })
      .catch((err: unknown) => {
        if (isCancelled(err)) return;
        console.error('Failed to size position:', err);
        setError(describeError(err, 'Failed to size position'));
      });

    return () => controller.abort();
  }, [debounced]);

  return { result, error };
}
