import { Pie, PieChart, Cell, ResponsiveContainer } from 'recharts';
import type { GaugeSpec } from '../lib/types';
import { bandSegments, valueSegments } from '../lib/gauge';
import { formatPct } from '../lib/format';

function Gauge({ spec }: { spec: GaugeSpec }) {
  const bands = bandSegments(spec);
  const value = valueSegments(spec);

  return (
    <div className="card gauge">
      <h4 style={{ margin: '0 0 0.5rem 0', textAlign: 'center' }}>{spec.title}</h4>
      <ResponsiveContainer width="100%" height={140}>
        <PieChart>
          <Pie
            data={bands}
            dataKey="value"
            cx="50%"
            cy="90%"
            startAngle={180}
            endAngle={0}
            innerRadius="70%"
            outerRadius="100%"
            stroke="none"
            isAnimationActive={false}
          >
            {bands.map((segment) => (
              <Cell key={segment.name} fill={segment.color} />
            ))}
          </Pie>
          <Pie
            data={value}
            dataKey="value"
            cx="50%"
            cy="90%"
            startAngle={180}
            endAngle={0}
            innerRadius="78%"
            outerRadius="92%"
            stroke="none"
          >
            {value.map((segment) => (
              <Cell key={segment.name} fill={segment.color} />
            ))}
          </Pie>
        </PieChart>
      </ResponsiveContainer>
      <div className="gauge-value">{formatPct(spec.value, 0)}</div>
      <div className="slider-scale">
        <span>{spec.axis[0]}</span>
        <span>{spec.axis[1]}</span>
      </div>
    </div>
  );
}

function ScenarioGauges({ gauges }: { gauges: GaugeSpec[] }) {
  return (
    <div className="card" style={{ marginBottom: '1.5rem' }}>
      <h3 style={{ margin: '0 0 1rem 0' }}>Monthly Return Scenarios</h3>
      <div className="gauge-grid">
        {gauges.map((spec) => (
          <Gauge key={spec.key} spec={spec} />
        ))}
      </div>
    </div>
  );
}

export default ScenarioGauges;
