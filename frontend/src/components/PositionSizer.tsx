import { useMemo, useState } from 'react';
import { AlertTriangle, Calculator } from 'lucide-react';
import type { DashboardParams, ParameterDefinition, SizingParams } from '../lib/types';
import { usePositionSize } from '../hooks/usePositionSize';
import { formatUnits, formatUsd } from '../lib/format';
import NumberField from './NumberField';

interface PositionSizerProps {
  params: DashboardParams;
  definitions: ParameterDefinition[];
}

function PositionSizer({ params, definitions }: PositionSizerProps) {
  const entry = definitions.find((d) => d.key === 'entryPrice');
  const stop = definitions.find((d) => d.key === 'stopLossPrice');
  const [entryPrice, setEntryPrice] = useState(entry?.defaultValue ?? 100);
  const [stopLossPrice, setStopLossPrice] = useState(stop?.defaultValue ?? 95);

  const request = useMemo<SizingParams>(
    () => ({
      initialPortfolio: params.initialPortfolio,
      riskPct: params.riskPct,
      entryPrice,
      stopLossPrice,
    }),
    [params.initialPortfolio, params.riskPct, entryPrice, stopLossPrice],
  );
  const { result, error } = usePositionSize(request);

  return (
    <div className="card">
      <h3 style={{ margin: '0 0 1rem 0', display: 'flex', alignItems: 'center', gap: '0.5rem' }}>
        <Calculator size={18} /> Position Sizing
      </h3>

      <div className="grid" style={{ marginBottom: '1rem' }}>
        {entry && <NumberField definition={entry} value={entryPrice} onChange={setEntryPrice} />}
        {stop && <NumberField definition={stop} value={stopLossPrice} onChange={setStopLossPrice} />}
      </div>

      {error && <div className="banner error">{error}</div>}

      {result && (
        <>
          {result.unavailableReason === 'ENTRY_EQUALS_STOP' && (
            <div className="banner warning">
              <AlertTriangle size={16} /> Position size is undefined: the entry price equals the stop-loss price, so a
              stop hit risks nothing per unit.
            </div>
          )}
          <div className="grid">
            <div className="metric card">
              <div className="metric-label">Risk Amount</div>
              <div className="metric-value">{formatUsd(result.riskAmount)}</div>
            </div>
            <div className="metric card">
              <div className="metric-label">Risk Per Unit</div>
              <div className="metric-value">{formatUsd(result.riskPerUnit)}</div>
            </div>
            <div className="metric card">
              <div className="metric-label">Position Size (units)</div>
              <div className="metric-value">{formatUnits(result.positionSize)}</div>
              {result.direction && <div className="metric-note">{result.direction === 'long' ? 'Long' : 'Short'}</div>}
            </div>
            <div className="metric card">
              <div className="metric-label">Total Position Value</div>
              <div className="metric-value">{formatUsd(result.totalValue)}</div>
            </div>
          </div>
        </>
      )}
    </div>
  );
}

export default PositionSizer;
