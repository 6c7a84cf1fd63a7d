export { main } from './cli/main.js';
export { benchmark, registry, Registry } from '@microbench/core';
export type { Benchmark, BenchmarkResult, Options, RoundProgress } from '@microbench/core';

export * as config from './config.js';
export { exportResults, serialize, FORMATS } from './exporters.js';
export type { Format } from './exporters.js';
export { runSuite } from './runner.js';
export type { SuiteOptions } from './runner.js';
export { ProgressBar } from './progressBar.js';
export { withHiddenCursor } from './cursor.js';
export { formatResult, writeResult } from './consoleWriter.js';
