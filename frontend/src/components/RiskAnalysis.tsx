import { Info, CheckCircle } from 'lucide-react';
import type { RiskMetrics } from '../lib/types';
import { formatCount, formatUsd } from '../lib/format';

function RiskAnalysis({ metrics }: { metrics: RiskMetrics }) {
  return (
    <div className="card" style={{ marginBottom: '1.5rem' }}>
      <h3 style={{ margin: '0 0 1rem 0' }}>Portfolio Risk Analysis</h3>

      <div className="banner info">
        <Info size={16} /> Maximum Potential Loss (Based on Max DD): {formatUsd(metrics.maxLoss)}
      </div>

      <div className="metric card" title="Based on risk per trade">
        <div className="metric-label">Maximum Number of Simultaneous Trades</div>
        <div className="metric-value">{formatCount(metrics.maxTradesDisplay)}</div>
        {metrics.maxTradesDisplay === null && (
          <div className="metric-note">Undefined: nothing is risked per trade.</div>
        )}
      </div>

      <div className="banner success">
        <CheckCircle size={16} /> Remaining Portfolio After Max DD: {formatUsd(metrics.remainingPortfolio)}
      </div>

      <div className="metric card" title="Suggested position size based on risk parameters">
        <div className="metric-label">Average Trade Size</div>
        <div className="metric-value">{formatUsd(metrics.averageTradeSize)}</div>
      </div>
    </div>
  );
}

export default RiskAnalysis;
