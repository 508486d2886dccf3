import { useEffect, useState } from 'react';
import { BarChart, Calculator, RefreshCw } from 'lucide-react';
import ParameterSidebar from './ParameterSidebar';
import MetricCards from './MetricCards';
import ScenarioGauges from './ScenarioGauges';
import ProjectionChart from './ProjectionChart';
import RiskAnalysis from './RiskAnalysis';
import PositionSizer from './PositionSizer';
import { useDashboard } from '../hooks/useDashboard';
import { describeError, fetchParameters } from '../lib/api';
import type { DashboardParams, ParameterDefinition, ProjectionMode } from '../lib/types';
import { clampScenarioParams } from '../lib/scenarios';

type Tab = 'strategy' | 'sizing';

function defaultParams(definitions: ParameterDefinition[]): DashboardParams {
  const value = (key: keyof DashboardParams, fallback: number) =>
    definitions.find((d) => d.key === key)?.defaultValue ?? fallback;

  return clampScenarioParams({
    initialPortfolio: value('initialPortfolio', 75000),
    riskPct: value('riskPct', 2.0),
    maxDrawdownPct: value('maxDrawdownPct', 32.6),
    bestCasePct: value('bestCasePct', 66),
    normalCasePct: value('normalCasePct', 32),
    worstCasePct: value('worstCasePct', 21),
  });
}

function Dashboard() {
  const [activeTab, setActiveTab] = useState<Tab>('strategy');
  const [definitions, setDefinitions] = useState<ParameterDefinition[]>([]);
  const [params, setParams] = useState<DashboardParams | null>(null);
  const [projectionMode, setProjectionMode] = useState<ProjectionMode>('linear');
  const [loadError, setLoadError] = useState<string | null>(null);

  const { data, loading, error } = useDashboard(params, projectionMode);

  const loadParameters = async () => {
    try {
      const response = await fetchParameters();
      setDefinitions(response.parameters);
      setParams(defaultParams(response.parameters));
      setProjectionMode(response.projection.mode);
      setLoadError(null);
    } catch (err: unknown) {
      console.error('Failed to fetch parameters:', err);
      setLoadError(describeError(err, 'Failed to fetch parameters'));
    }
  };

  useEffect(() => {
    void loadParameters();
  }, []);

  if (loadError) {
    return (
      <div className="card">
        <div className="banner error">{loadError}</div>
        <button className="button" onClick={() => void loadParameters()}>
          <RefreshCw size={14} /> Retry
        </button>
      </div>
    );
  }

  if (!params) {
    return <div className="card">Loading parameters...</div>;
  }

  return (
    <div className="layout">
      <ParameterSidebar definitions={definitions} params={params} onChange={setParams} />

      <main className="content">
        <h1 style={{ marginTop: 0 }}>Trading Strategy Metrics</h1>

        <div className="tabs">
          <button
            className={`button toggle${activeTab === 'strategy' ? ' active' : ''}`}
            onClick={() => setActiveTab('strategy')}
          >
            <BarChart size={14} /> Strategy
          </button>
          <button
            className={`button toggle${activeTab === 'sizing' ? ' active' : ''}`}
            onClick={() => setActiveTab('sizing')}
          >
            <Calculator size={14} /> Position Sizing
          </button>
          {loading && <span className="muted">Updating...</span>}
        </div>

        {error && <div className="banner error">{error}</div>}

        {activeTab === 'strategy' && data && (
          <>
            {data.scenariosAdjusted && (
              <div className="banner warning">Scenario returns were reordered so that worst ≤ normal ≤ best.</div>
            )}
            <MetricCards metrics={data.metrics} />
            <ScenarioGauges gauges={data.gauges} />
            <ProjectionChart projection={data.projection} mode={projectionMode} onModeChange={setProjectionMode} />
            <RiskAnalysis metrics={data.metrics} />
          </>
        )}

        {activeTab === 'sizing' && <PositionSizer params={params} definitions={definitions} />}

        <footer className="footer">
          <i>
            Note: All calculations are based on provided estimates and actual results may vary. Past performance does
            not guarantee future results.
          </i>
        </footer>
      </main>
    </div>
  );
}

export default Dashboard;
