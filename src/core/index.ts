// Naming pipeline core module
export * from './rename-types';
export * from './constants';
export * from './logger';
export * from './photo';
export * from './filename-sanitizer';
export * from './description-normalizer';
export * from './index-allocator';
export * from './batch-processor';
export * from './photo-collection';
export * from './album-set';
export * from './photo-table-view';
export * from './reprocess-scheduler';
export * from './error-handler';
export * from './rename-config-manager';
