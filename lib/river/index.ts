/**
 * River Module
 *
 * Exports all river-update functionality.
 */

export * from './types';
export * from './errors';
export * from './stations';
export * from './statusClassifier';
export * from './fetcher';
export * from './shaper';
export * from './summary';
export * from './charts';
export * from './config';
export * from './publisher';
export * from './pipeline';
