export * as online from './stats/OnlineStats.js';
export * from './stats/summary.js';
