export type TradeDirection = 'long' | 'short';

export type PositionSizeUnavailableReason = 'ENTRY_EQUALS_STOP';

export interface PositionSize {
  riskAmount: number;
  entryPrice: number;
  stopLossPrice: number;
  riskPerUnit: number; // |entry - stop|
  // Null together with direction when entry and stop coincide
  positionSize: number | null; // Units
  totalValue: number | null; // USD, positionSize * entryPrice
  direction: TradeDirection | null;
  unavailableReason: PositionSizeUnavailableReason | null;
}

export interface PositionSizeResult extends PositionSize {
  initialPortfolio: number;
  riskPct: number;
}
