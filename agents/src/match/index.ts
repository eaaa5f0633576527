/**
 * Match - company intelligence used by the culture and growth scorers
 */

export * from './company-signals.js';
export * from './company-profiler.js';
