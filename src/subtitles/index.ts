export * from './types';
export * from './subtitleNormalizer';
export * from './subtitleLocator';
export * from './subtitleAcquirer';
