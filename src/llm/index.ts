export * from './types';
export * from './llmFactory';
export * from './openaiProvider';
export * from './anthropicProvider';
export * from './geminiProvider';
