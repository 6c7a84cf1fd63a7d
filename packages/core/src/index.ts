export * as estimator from './estimator.js';
export * as planner from './planner.js';
export * as defaults from './defaults.js';

export * from './convergence.js';
export * from './result.js';
export * from './sampler.js';
export * from './registry.js';
export * as testing from './testing/scriptedTimer.js';
