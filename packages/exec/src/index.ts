export const name = '@findfile/exec';

export * from './search/shellSearch';
export * from './launcher/launcher';
export * from './launcher/commandLine';
