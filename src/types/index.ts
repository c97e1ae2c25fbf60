/**
 * Type definitions for trackfetch
 */

export * from './track';
export * from './quota';
export * from './config';
export type { AppContext } from './app';
