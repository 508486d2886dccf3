import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, Legend } from 'recharts';
import type { ProjectionMode, ProjectionResult } from '../lib/types';
import { lineColor, toProjectionRows } from '../lib/chart';
import { formatAxisUsd, formatUsd } from '../lib/format';

interface ProjectionChartProps {
  projection: ProjectionResult;
  mode: ProjectionMode;
  onModeChange: (mode: ProjectionMode) => void;
}

const MODES: { value: ProjectionMode; label: string }[] = [
  { value: 'linear', label: 'Linear' },
  { value: 'compound', label: 'Compound' },
];

function ProjectionChart({ projection, mode, onModeChange }: ProjectionChartProps) {
  const rows = toProjectionRows(projection);
  const labels = new Map(projection.series.map((s) => [s.scenario, s.label]));

  return (
    <div className="card" style={{ marginBottom: '1.5rem' }}>
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', marginBottom: '1rem' }}>
        <h3 style={{ margin: 0 }}>{projection.title}</h3>
        <div style={{ display: 'flex', gap: '0.5rem' }}>
          {MODES.map((m) => (
            <button
              key={m.value}
              type="button"
              className={`button toggle${mode === m.value ? ' active' : ''}`}
              onClick={() => onModeChange(m.value)}
            >
              {m.label}
            </button>
          ))}
        </div>
      </div>
      <ResponsiveContainer width="100%" height={400}>
        <LineChart data={rows}>
          <CartesianGrid strokeDasharray="3 3" stroke="#374151" />
          <XAxis
            dataKey="month"
            stroke="#9ca3af"
            label={{ value: projection.xAxisTitle, position: 'insideBottom', offset: -4, fill: '#9ca3af' }}
          />
          <YAxis
            stroke="#9ca3af"
            width={80}
            tickFormatter={formatAxisUsd}
            label={{ value: projection.yAxisTitle, angle: -90, position: 'insideLeft', fill: '#9ca3af' }}
          />
          <Tooltip
            contentStyle={{
              backgroundColor: '#1f2937',
              border: '1px solid #374151',
              borderRadius: '8px',
              color: '#f3f4f6',
            }}
            labelFormatter={(month) => `Month ${month}`}
            formatter={(value: number) => formatUsd(value)}
          />
          <Legend />
          {projection.series.map((s) => (
            <Line
              key={s.scenario}
              type="monotone"
              dataKey={s.scenario}
              name={labels.get(s.scenario)}
              stroke={lineColor(s.color)}
              strokeWidth={2}
              dot={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}

export default ProjectionChart;
