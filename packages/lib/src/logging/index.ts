/**
 * @module @gridcalc/lib/logging
 * @description Logging infrastructure
 */

export * from './logger';
