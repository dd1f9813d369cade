/**
 * @recstat/core/import - Statistics import reconciliation
 */

export * from './types.js';
export { classify, classifyAll } from './classifier.js';
export { plan } from './planner.js';
export { execute, applyIntents, renderDryRun } from './executor.js';
export { toParameterized, toLiteralSql, formatLiteral, formatReal, quoteText } from './statements.js';
export { summarize, formatReport } from './summary.js';
export { runImport, type RunImportOptions } from './pipeline.js';
export { parseInteger, parseReal, parseValue, type ParsedValue } from './values.js';
