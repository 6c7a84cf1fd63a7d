export * as array from './array.js';
export * as assert from './assert.js';
export * as timer from './timer.js';
export * as stats from './stats.js';
export * as quantity from './quantity.js';

export * from './util.js';
export * from './assignDeep.js';
