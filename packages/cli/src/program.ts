import { Command } from 'commander';
import { runFind, type FindContext } from './commands/find';
import { readVersion } from './version';

/**
 * Every token after `ff` is query text, so commander parses no options besides
 * `--version` and hands the tokens over in the order they were typed.
 */
export function createProgram(context: FindContext): Command {
  const program = new Command();

  program
    .name('ff')
    .description('Find files and directories by parts of their paths')
    .version(readVersion(), '--version')
    .helpOption(false)
    .allowUnknownOption()
    .argument('[tokens...]', 'folders, path parts, flags and result numbers')
    .action(async (tokens: string[] | undefined) => {
      await runFind(tokens ?? [], context);
    });

  return program;
}
