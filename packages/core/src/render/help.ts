import { FLAG_IDS, FLAG_TABLE, type FlagGroup } from '../query/flags';
import type { Colors } from './colors';

const GROUP_TITLES: Readonly<Record<FlagGroup, string>> = {
  sort: 'Sort args (one at a time):',
  filter: 'Filter args:',
  select: 'Select args (one at a time):',
  info: 'Info args:',
};

const GROUP_ORDER: readonly FlagGroup[] = ['sort', 'filter', 'select', 'info'];

/**
 * Usage text, generated from the flag table so it cannot drift from what the
 * classifier accepts.
 */
export function renderHelp(colors: Colors, defaultFolder: string): string {
  const lines = [
    'FindFile, a file search utility used similarly to online search engines.',
    colors.gray('    A find command wrapper with added highlights and formatting.'),
    `    Searches files containing given path parts, in ${defaultFolder} by default.`,
    '    Excludes results containing any of path parts with leading dashes.',
    '    Shows results in a numbered list of full paths.',
    `    Can select results by given numbers. ${colors.gray('Mind that results may change.')}`,
    colors.gray('    * Asterisks around path parts are optional, are used automatically.'),
    colors.gray('    Default directory can be set in FF_DEFAULT_DIR environment variable.'),
    colors.gray('    Use args separately, like -p -i -n (-pin is treated as excluded path part).'),
    'Usage:',
    '    ff <include>',
    '    ff <dir> <dir> <include> <include> -<exclude> -<exclude> -<result_number>',
  ];

  for (const group of GROUP_ORDER) {
    lines.push(GROUP_TITLES[group]);
    for (const flag of FLAG_IDS) {
      const definition = FLAG_TABLE[flag];
      if (definition.group === group) {
        lines.push(`    ${flag}${colors.gray(':')} ${definition.summary}`);
      }
    }
  }

  return lines.join('\n');
}
