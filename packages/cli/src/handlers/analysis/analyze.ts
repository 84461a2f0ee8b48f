import { parseSimulationConfig, runAnalysis, summarizeStress } from '@xolrisk/simulation';
import type { AnalyzeArgs } from '../../command-defs/analysis.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadConfig } from '../../core/config-loader.js';
import {
  reportTimestamp,
  serializeLayer,
  serializeMetrics,
  serializeStressImpact,
} from '../../core/report.js';
import type { LayerRecord, MetricsRecord, StressImpactRecord } from '../../core/report.js';

export interface AnalysisReport {
  generated_at: string;
  seed: number;
  trials: number;
  inflation_rate: number;
  premium: number;
  layer: LayerRecord;
  baseline: MetricsRecord;
  stressed: MetricsRecord;
  stress_impact: StressImpactRecord[];
}

export async function analyzeHandler(
  args: AnalyzeArgs,
  ctx: CommandContext
): Promise<AnalysisReport> {
  const config = parseSimulationConfig(
    loadConfig(args.config, {
      trials: args.trials,
      seed: args.seed,
      inflationRate: args.inflation,
    })
  );

  const { baseline, stressed } = await runAnalysis(config, { signal: ctx.signal });

  return {
    generated_at: reportTimestamp(ctx),
    seed: config.seed,
    trials: config.trials,
    inflation_rate: config.inflationRate,
    premium: config.premium,
    layer: serializeLayer(config.layer),
    baseline: serializeMetrics(baseline),
    stressed: serializeMetrics(stressed),
    stress_impact: serializeStressImpact(summarizeStress(baseline, stressed)),
  };
}
