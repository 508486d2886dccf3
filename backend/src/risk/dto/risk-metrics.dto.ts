export interface RiskMetrics {
  initialPortfolio: number;
  riskPct: number;
  maxDrawdownPct: number;

  riskAmount: number; // USD risked on a single trade
  maxLoss: number; // USD lost at the estimated max drawdown
  remainingPortfolio: number; // USD left after the max drawdown

  // Null when the risk amount is zero
  maxTrades: number | null; // Unfloored portfolio / riskAmount
  maxTradesDisplay: number | null; // Whole simultaneous trades
  averageTradeSize: number | null; // USD, portfolio / maxTrades
}
