import { bandSegments, valueSegments, GAUGE_TRACK_COLOR } from './gauge';
import type { GaugeSpec } from './types';

const gauge = (value: number, worst: number, normal: number, best: number): GaugeSpec => ({
  key: 'best',
  title: 'Best Case',
  value,
  axis: [0, 100],
  barColor: 'darkblue',
  bands: [
    { from: 0, to: worst, color: 'lightgray' },
    { from: worst, to: normal, color: 'gray' },
    { from: normal, to: best, color: 'lightblue' },
  ],
});

describe('gauge segments', () => {
  describe('bandSegments', () => {
    it('should lay the bands end to end and fill the rest of the axis', () => {
      expect(bandSegments(gauge(66, 21, 32, 66))).toEqual([
        { name: 'band-0', value: 21, color: '#9ca3af' },
        { name: 'band-1', value: 11, color: '#6b7280' },
        { name: 'band-2', value: 34, color: '#93c5fd' },
        { name: 'rest', value: 34, color: GAUGE_TRACK_COLOR },
      ]);
    });

    it('should drop empty bands', () => {
      expect(bandSegments(gauge(40, 0, 40, 40))).toEqual([
        { name: 'band-1', value: 40, color: '#6b7280' },
        { name: 'rest', value: 60, color: GAUGE_TRACK_COLOR },
      ]);
    });

    it('should leave no remainder when best reaches the axis maximum', () => {
      const segments = bandSegments(gauge(100, 20, 50, 100));

      expect(segments.map((s) => s.name)).toEqual(['band-0', 'band-1', 'band-2']);
      expect(segments.reduce((sum, s) => sum + s.value, 0)).toBe(100);
    });
  });

  describe('valueSegments', () => {
    it('should fill up to the value', () => {
      expect(valueSegments(gauge(66, 21, 32, 66))).toEqual([
        { name: 'value', value: 66, color: '#1e40af' },
        { name: 'empty', value: 34, color: 'transparent' },
      ]);
    });

    it('should keep the value on the axis', () => {
      expect(valueSegments(gauge(140, 21, 32, 66))[0].value).toBe(100);
    });
  });
});
