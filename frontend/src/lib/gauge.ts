import type { GaugeSpec } from './types';

export interface GaugeSegment {
  name: string;
  value: number;
  color: string;
}

export const GAUGE_TRACK_COLOR = '#1f2937';

// Plotly's named band colors, toned for the dark theme
const NAMED_COLORS: Record<string, string> = {
  lightgray: '#9ca3af',
  gray: '#6b7280',
  lightblue: '#93c5fd',
  darkblue: '#1e40af',
};

export function resolveColor(color: string): string {
  return NAMED_COLORS[color] ?? color;
}

/**
 * Splits the gauge axis into consecutive arcs: the shaded bands in order,
 * then an unshaded remainder up to the axis maximum. Empty bands are dropped.
 */
export function bandSegments(spec: GaugeSpec): GaugeSegment[] {
  const [min, max] = spec.axis;
  const segments: GaugeSegment[] = [];
  let cursor = min;

  spec.bands.forEach((band, i) => {
    const from = Math.max(band.from, cursor);
    const to = Math.min(band.to, max);
    if (to > from) {
      segments.push({ name: `band-${i}`, value: to - from, color: resolveColor(band.color) });
      cursor = to;
    }
  });

  if (max > cursor) {
    segments.push({ name: 'rest', value: max - cursor, color: GAUGE_TRACK_COLOR });
  }
  return segments;
}

/**
 * The value bar: a filled arc up to the value and an empty arc for the rest.
 */
export function valueSegments(spec: GaugeSpec): GaugeSegment[] {
  const [min, max] = spec.axis;
  const value = Math.min(max, Math.max(min, spec.value));
  return [
    { name: 'value', value: value - min, color: resolveColor(spec.barColor) },
    { name: 'empty', value: max - value, color: 'transparent' },
  ];
}
