/**
 * Analysis Commands
 */

import type { Command } from 'commander';
import { analyzeSchema, compareSchema } from '../command-defs/analysis.js';
import { parseArguments } from '../core/argument-parser.js';
import { coerceInteger, coerceNumber } from '../core/coerce.js';
import { createCommandContext } from '../core/command-context.js';
import type { CommandContext } from '../core/command-context.js';
import { formatError } from '../core/error-handler.js';
import { formatOutput } from '../core/output-formatter.js';
import { describeLayer, metricsTableCells } from '../core/report.js';
import { analyzeHandler } from '../handlers/analysis/analyze.js';
import type { AnalysisReport } from '../handlers/analysis/analyze.js';
import { compareLayersHandler } from '../handlers/analysis/compare-layers.js';
import type { ComparisonReport } from '../handlers/analysis/compare-layers.js';
import type { OutputFormat } from '../types/index.js';

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

export function renderAnalysisReport(report: AnalysisReport, format: OutputFormat): string {
  const rows = [
    { scenario: 'baseline', ...metricsTableCells(report.baseline) },
    { scenario: 'stressed', ...metricsTableCells(report.stressed) },
  ];
  const preamble = [
    `Layer: ${describeLayer(report.layer)}, premium ${report.premium}`,
    `Seed ${report.seed}, ${report.trials} trials, inflation ${formatPercent(report.inflation_rate)}`,
    `Generated at ${report.generated_at}`,
  ];
  return formatOutput(report, format, rows, preamble);
}

export function renderComparisonReport(report: ComparisonReport, format: OutputFormat): string {
  const rows = report.layers.flatMap((layer) =>
    (['baseline', 'stressed'] as const).map((scenario) => ({
      label: layer.label,
      layer: describeLayer(layer),
      scenario,
      premium: layer.premium,
      ...metricsTableCells(layer[scenario]),
    }))
  );
  const preamble = [
    `Seed ${report.seed}, ${report.trials} trials, inflation ${formatPercent(report.inflation_rate)}`,
    `Generated at ${report.generated_at}`,
  ];
  return formatOutput(report, format, rows, preamble);
}

/**
 * Context for one CLI invocation: Ctrl-C aborts the run between batches
 */
function cliContext(): { ctx: CommandContext; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  return {
    ctx: createCommandContext({ signal: controller.signal }),
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
}

/**
 * Register analysis commands
 */
export function registerAnalysisCommands(program: Command): void {
  program
    .command('analyze')
    .description('Simulate one layer under baseline and inflation-stressed claims')
    .requiredOption('--config <file>', 'YAML analysis config')
    .option('--trials <n>', 'Override the number of trials')
    .option('--seed <n>', 'Override the random seed')
    .option('--inflation <rate>', 'Override the stress inflation rate, e.g. 0.08')
    .option('--format <format>', 'Output format (table, json)', 'table')
    .action(async (options: Record<string, unknown>) => {
      const { ctx, dispose } = cliContext();
      try {
        const args = parseArguments(analyzeSchema, {
          ...options,
          trials: coerceInteger(options.trials, 'trials'),
          seed: coerceInteger(options.seed, 'seed'),
          inflation: coerceNumber(options.inflation, 'inflation'),
        });
        const report = await analyzeHandler(args, ctx);
        console.log(renderAnalysisReport(report, args.format));
      } catch (error) {
        console.error(formatError(error, { command: 'analyze' }));
        process.exitCode = 1;
      } finally {
        dispose();
      }
    });

  program
    .command('compare')
    .description('Compare candidate layers against the same simulated claims')
    .requiredOption('--config <file>', 'YAML config with a layers list')
    .option('--trials <n>', 'Override the number of trials')
    .option('--seed <n>', 'Override the random seed')
    .option('--format <format>', 'Output format (table, json)', 'table')
    .action(async (options: Record<string, unknown>) => {
      const { ctx, dispose } = cliContext();
      try {
        const args = parseArguments(compareSchema, {
          ...options,
          trials: coerceInteger(options.trials, 'trials'),
          seed: coerceInteger(options.seed, 'seed'),
        });
        const report = await compareLayersHandler(args, ctx);
        console.log(renderComparisonReport(report, args.format));
      } catch (error) {
        console.error(formatError(error, { command: 'compare' }));
        process.exitCode = 1;
      } finally {
        dispose();
      }
    });
}
