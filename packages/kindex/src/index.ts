export * from './errors';
export * from './types';
export * from './schema';
export * from './parser';
export * from './qualityFilter';
export * from './windows';
export * from './quantizer';
export * from './pipeline';
export * from './derivatives';
export * from './fileSelection';
