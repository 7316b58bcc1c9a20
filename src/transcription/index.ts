export * from './types';
export * from './whisperClient';
export * from './audioTranscriber';
