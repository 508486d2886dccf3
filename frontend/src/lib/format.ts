export const EMPTY_VALUE = '—';

const usd = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * `$75,000.00 USD`, with the sign ahead of the dollar: `-$24,450.00 USD`.
 */
export function formatUsd(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return EMPTY_VALUE;
  const sign = value < 0 ? '-' : '';
  return `${sign}$${usd.format(Math.abs(value))} USD`;
}

export function formatPct(value: number | null, decimals = 1): string {
  if (value === null || !Number.isFinite(value)) return EMPTY_VALUE;
  return `${value.toFixed(decimals)}%`;
}

export function formatCount(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return EMPTY_VALUE;
  return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

export function formatUnits(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return EMPTY_VALUE;
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 4 });
}

export function formatAxisUsd(value: number): string {
  if (Math.abs(value) >= 1_000_000) return `$${(value / 1_000_000).toFixed(1)}M`;
  if (Math.abs(value) >= 1_000) return `$${(value / 1_000).toFixed(0)}k`;
  return `$${value.toFixed(0)}`;
}
