export const name = '@findfile/core';

export * from './query/flags';
export * from './query/folders';
export * from './query/classifier';
export type { Classification } from './query/types';
export * from './search/compiler';
export * from './search/command';
export * from './search/matcher';
export type { SearchSpec, EntityKind, FragmentOrder } from './search/types';
export * from './results/parser';
export type { ResultEntry } from './results/types';
export * from './render/colors';
export * from './render/fileLink';
export * from './render/format';
export * from './render/highlight';
export * from './render/help';
export * from './render/renderer';
export * from './selection/resolver';
export * from './config/loader';
