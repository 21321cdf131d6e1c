/**
 * @nodepick/core - selection 엔진
 */
export * from './errors/index';
export * from './logger/index';
export * from './manifest/index';
export * from './graph-index/index';
export * from './graph-queue/index';
export * from './selector-methods/index';
export * from './selection-spec/index';
export * from './selector/index';
