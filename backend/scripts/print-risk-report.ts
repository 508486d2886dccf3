import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { ParametersService, ParameterKey } from '../src/parameters/parameters.service';
import { DashboardService } from '../src/dashboard/dashboard.service';
import { SizingService } from '../src/sizing/sizing.service';

const usd = (value: number | null) =>
  value === null ? '—' : `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

async function printRiskReport() {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['warn', 'error'] });
  const parametersService = app.get(ParametersService);
  const dashboardService = app.get(DashboardService);
  const sizingService = app.get(SizingService);

  const definitions = parametersService.getDefinitions();
  const defaults = new Map<ParameterKey, number>(definitions.parameters.map((p) => [p.key, p.defaultValue]));
  const value = (key: ParameterKey) => defaults.get(key) ?? 0;

  console.log('\n=== RISK REPORT (configured defaults) ===\n');

  const dashboard = dashboardService.build({
    initialPortfolio: value('initialPortfolio'),
    riskPct: value('riskPct'),
    maxDrawdownPct: value('maxDrawdownPct'),
    bestCasePct: value('bestCasePct'),
    normalCasePct: value('normalCasePct'),
    worstCasePct: value('worstCasePct'),
    projectionMode: definitions.projection.mode,
    projectionMonths: definitions.projection.months,
  });
  const { metrics, projection } = dashboard;

  console.log(`Initial Portfolio:        ${usd(metrics.initialPortfolio)}`);
  console.log(`Risk Per Trade:           ${usd(metrics.riskAmount)} (${metrics.riskPct}%)`);
  console.log(`Max Potential Loss:       ${usd(metrics.maxLoss)} (${metrics.maxDrawdownPct}%)`);
  console.log(`Remaining After Max DD:   ${usd(metrics.remainingPortfolio)}`);
  console.log(`Max Simultaneous Trades:  ${metrics.maxTradesDisplay ?? '—'}`);
  console.log(`Average Trade Size:       ${usd(metrics.averageTradeSize)}`);

  console.log(`\n${projection.title}`);
  for (const series of projection.series) {
    const last = series.values[series.values.length - 1];
    console.log(`  ${series.label.padEnd(8)} ${String(series.returnPct).padStart(3)}%/mo -> ${usd(last)}`);
  }

  const sizing = sizingService.size({
    initialPortfolio: value('initialPortfolio'),
    riskPct: value('riskPct'),
    entryPrice: value('entryPrice'),
    stopLossPrice: value('stopLossPrice'),
  });

  console.log('\nPosition Sizing');
  console.log(`  Entry / Stop:   ${usd(sizing.entryPrice)} / ${usd(sizing.stopLossPrice)}`);
  if (sizing.unavailableReason) {
    console.log(`  ❌ Position size undefined (${sizing.unavailableReason})`);
  } else {
    console.log(`  Direction:      ${sizing.direction}`);
    console.log(`  Position Size:  ${sizing.positionSize?.toFixed(4)} units`);
    console.log(`  Total Value:    ${usd(sizing.totalValue)}`);
  }

  await app.close();
}

printRiskReport().catch((error: unknown) => {
  console.error('Failed to build risk report:', error);
  process.exit(1);
});
