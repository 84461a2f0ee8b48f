import { compareLayers, parseCompareConfig } from '@xolrisk/simulation';
import type { CompareArgs } from '../../command-defs/analysis.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadConfig } from '../../core/config-loader.js';
import { reportTimestamp, serializeLayer, serializeMetrics } from '../../core/report.js';
import type { LayerRecord, MetricsRecord } from '../../core/report.js';

export interface LayerComparisonRecord extends LayerRecord {
  label: string;
  premium: number;
  baseline: MetricsRecord;
  stressed: MetricsRecord;
}

export interface ComparisonReport {
  generated_at: string;
  seed: number;
  trials: number;
  inflation_rate: number;
  layers: LayerComparisonRecord[];
}

export async function compareLayersHandler(
  args: CompareArgs,
  ctx: CommandContext
): Promise<ComparisonReport> {
  const config = parseCompareConfig(
    loadConfig(args.config, { trials: args.trials, seed: args.seed })
  );

  const rows = await compareLayers(config, { signal: ctx.signal });

  return {
    generated_at: reportTimestamp(ctx),
    seed: config.seed,
    trials: config.trials,
    inflation_rate: config.inflationRate,
    layers: rows.map((row) => ({
      label: row.label,
      ...serializeLayer(row.layer),
      premium: row.premium,
      baseline: serializeMetrics(row.baseline),
      stressed: serializeMetrics(row.stressed),
    })),
  };
}
