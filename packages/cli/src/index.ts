/**
 * @xolrisk/cli - command-line driver for the simulation package
 */

export {
  registerAnalysisCommands,
  renderAnalysisReport,
  renderComparisonReport,
} from './commands/analysis.js';
export { analyzeHandler, type AnalysisReport } from './handlers/analysis/analyze.js';
export {
  compareLayersHandler,
  type ComparisonReport,
  type LayerComparisonRecord,
} from './handlers/analysis/compare-layers.js';
export { createCommandContext, type CommandContext } from './core/command-context.js';
export { formatError } from './core/error-handler.js';
export { loadConfig, deepMerge } from './core/config-loader.js';
export { formatJSON, formatTable, formatOutput } from './core/output-formatter.js';
export * from './core/report.js';
export * from './types/index.js';
