import { DollarSign, ShieldAlert, TrendingDown } from 'lucide-react';
import type { RiskMetrics } from '../lib/types';
import { formatPct, formatUsd } from '../lib/format';

function MetricCards({ metrics }: { metrics: RiskMetrics }) {
  return (
    <div className="grid" style={{ marginBottom: '1.5rem' }}>
      <div className="metric card">
        <div className="metric-label">
          <DollarSign size={14} /> Initial Portfolio
        </div>
        <div className="metric-value">{formatUsd(metrics.initialPortfolio)}</div>
      </div>
      <div className="metric card">
        <div className="metric-label">
          <ShieldAlert size={14} /> Risk Per Trade
        </div>
        <div className="metric-value">{formatUsd(metrics.riskAmount)}</div>
        <div className="metric-delta positive">{formatPct(metrics.riskPct)}</div>
      </div>
      <div className="metric card">
        <div className="metric-label">
          <TrendingDown size={14} /> Estimated Max Drawdown
        </div>
        <div className="metric-value">{formatPct(metrics.maxDrawdownPct)}</div>
        {/* A loss, so shown in the loss color even though the number is positive */}
        <div className="metric-delta negative">{formatUsd(-metrics.maxLoss)}</div>
      </div>
    </div>
  );
}

export default MetricCards;
