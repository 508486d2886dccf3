import type { DashboardParams, ParameterDefinition } from '../lib/types';
import { applyScenarioChange, scenarioSliderMax, type ScenarioParam } from '../lib/scenarios';
import NumberField from './NumberField';

interface ParameterSidebarProps {
  definitions: ParameterDefinition[];
  params: DashboardParams;
  onChange: (params: DashboardParams) => void;
}

const SCENARIO_PARAMS: ScenarioParam[] = ['bestCasePct', 'normalCasePct', 'worstCasePct'];

function isScenarioParam(key: string): key is ScenarioParam {
  return SCENARIO_PARAMS.some((p) => p === key);
}

function SliderField({
  label,
  value,
  min,
  max,
  step,
  onChange,
}: {
  label: string;
  value: number;
  min: number;
  max: number;
  step: number;
  onChange: (v: number) => void;
}) {
  const decimals = step < 1 ? 1 : 0;

  return (
    <div className="field">
      <label className="field-label">{label}</label>
      <input
        type="range"
        min={min}
        max={max}
        step={step}
        value={value}
        disabled={max <= min}
        onChange={(e) => onChange(Number(e.target.value))}
        className="slider"
      />
      <div className="slider-scale">
        <span>{min}</span>
        <span className="slider-value">{value.toFixed(decimals)}</span>
        <span>{max}</span>
      </div>
    </div>
  );
}

function ParameterSidebar({ definitions, params, onChange }: ParameterSidebarProps) {
  const byKey = new Map(definitions.map((d) => [d.key, d]));
  const portfolio = byKey.get('initialPortfolio');
  const risk = byKey.get('riskPct');
  const drawdown = byKey.get('maxDrawdownPct');

  const handleScenario = (key: ScenarioParam, value: number) => {
    onChange(applyScenarioChange(params, key, value));
  };

  return (
    <aside className="sidebar card">
      <h2 style={{ marginTop: 0 }}>Trading Parameters</h2>

      {portfolio && (
        <NumberField
          definition={portfolio}
          value={params.initialPortfolio}
          onChange={(v) => onChange({ ...params, initialPortfolio: v })}
        />
      )}

      {risk && (
        <SliderField
          label={risk.label}
          value={params.riskPct}
          min={risk.min}
          max={risk.max}
          step={risk.step}
          onChange={(v) => onChange({ ...params, riskPct: v })}
        />
      )}

      {drawdown && (
        <SliderField
          label={drawdown.label}
          value={params.maxDrawdownPct}
          min={drawdown.min}
          max={drawdown.max}
          step={drawdown.step}
          onChange={(v) => onChange({ ...params, maxDrawdownPct: v })}
        />
      )}

      <h3>Monthly Return Scenarios</h3>
      {definitions
        .filter((d): d is ParameterDefinition & { key: ScenarioParam } => isScenarioParam(d.key))
        .map((d) => (
          <SliderField
            key={d.key}
            label={d.label}
            value={params[d.key]}
            min={d.min}
            max={scenarioSliderMax(d.key, params)}
            step={d.step}
            onChange={(v) => handleScenario(d.key, v)}
          />
        ))}
    </aside>
  );
}

export default ParameterSidebar;
