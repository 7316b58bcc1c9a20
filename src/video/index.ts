export * from './types';
export * from './processRunner';
export * from './ffmpeg';
export * from './ytDlp';
