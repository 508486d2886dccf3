import { lineColor, toProjectionRows } from './chart';
import type { ProjectionResult } from './types';

describe('projection chart data', () => {
  const projection: ProjectionResult = {
    mode: 'linear',
    title: '3-Month Portfolio Projection (Linear)',
    xAxisTitle: 'Months',
    yAxisTitle: 'Portfolio Value (USD)',
    initialPortfolio: 75000,
    months: [1, 2, 3],
    series: [
      { scenario: 'best', label: 'Best Case', color: 'green', returnPct: 66, values: [124500, 174000, 223500] },
      { scenario: 'normal', label: 'Normal Case', color: 'blue', returnPct: 32, values: [99000, 123000, 147000] },
      { scenario: 'worst', label: 'Worst Case', color: 'red', returnPct: 21, values: [90750, 106500, 122250] },
    ],
  };

  it('should produce one row per month with every scenario', () => {
    expect(toProjectionRows(projection)).toEqual([
      { month: 1, best: 124500, normal: 99000, worst: 90750 },
      { month: 2, best: 174000, normal: 123000, worst: 106500 },
      { month: 3, best: 223500, normal: 147000, worst: 122250 },
    ]);
  });

  it('should map series colors onto the palette', () => {
    expect(lineColor('green')).toBe('#4ade80');
    expect(lineColor('#123456')).toBe('#123456');
  });
});
