export * from './credentials';
export * from './summaryPipeline';
export * from './jobRunner';
