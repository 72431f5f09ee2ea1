export const name = '@findfile/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './string-utils';
