export interface NumberBounds {
  min: number;
  max: number;
}

export type DraftResult = { ok: true; value: number } | { ok: false; message: string };

const bound = new Intl.NumberFormat('en-US', { maximumFractionDigits: 4 });

export function rangeHint({ min, max }: NumberBounds): string {
  return `Enter a number between ${bound.format(min)} and ${bound.format(max)}`;
}

/**
 * Reads what is typed in a number field. Partial input such as `0` on the way
 * to `0.45` is reported, not corrected, so the field keeps what was typed.
 */
export function parseNumberDraft(draft: string, bounds: NumberBounds): DraftResult {
  const text = draft.trim();
  if (text === '') return { ok: false, message: rangeHint(bounds) };

  const value = Number(text);
  if (!Number.isFinite(value) || value < bounds.min || value > bounds.max) {
    return { ok: false, message: rangeHint(bounds) };
  }
  return { ok: true, value };
}

/**
 * The value a field settles on when it loses focus: out-of-range numbers are
 * clamped, and anything unreadable falls back to `current`.
 */
export function commitNumberDraft(draft: string, bounds: NumberBounds, current: number): number {
  const text = draft.trim();
  const value = Number(text);
  if (text === '' || !Number.isFinite(value)) return current;
  return Math.min(Math.max(value, bounds.min), bounds.max);
}
