export * from './constants/index';
export * from './types/index';
export * from './utils/index';
