import {
  ConfigLoader,
  buildFindCommand,
  classifyTokens,
  compileSearch,
  createColors,
  createFolderContext,
  isHelpRequest,
  missingResultMessage,
  parseResults,
  renderHelp,
  resolveSelection,
  ResultRenderer,
  type RenderedLine,
} from '@findfile/core';
import { ShellSearchExecutor, SystemLauncher, type Launcher, type SearchExecutor } from '@findfile/exec';
import { ConsoleLogger, LaunchError, type Logger } from '@findfile/shared';
import type { Output } from '../output/console';

export interface FindContext {
  env: NodeJS.ProcessEnv;
  homeDir: string;
  cwd: string;
  output: Output;
  /** Explicit config file; otherwise FF_CONFIG or the XDG location. */
  configPath?: string;
  logger?: Logger;
  executor?: SearchExecutor;
  launcher?: Launcher;
}

/**
 * One `ff` invocation: classify the tokens, run the search once, then print,
 * quote or open the selected results.
 */
export async function runFind(tokens: readonly string[], context: FindContext): Promise<void> {
  const config = ConfigLoader.load({
    env: context.env,
    homeDir: context.homeDir,
    configPath: context.configPath,
  });
  const logger = context.logger ?? new ConsoleLogger(config.logLevel);
  const colors = createColors(config.color);
  const { output } = context;

  if (isHelpRequest(tokens)) {
    output.print(renderHelp(colors, config.defaultFolder));
    return;
  }

  const classification = classifyTokens(
    tokens,
    createFolderContext(config, { homeDir: context.homeDir, cwd: context.cwd }),
  );
  logger.debug(
    `Classified folders=${classification.folders.join(',')} include=${classification.includeFragments.join(',')} exclude=${[...classification.excludeFragments].join(',')} flags=${[...classification.flags].join(',')}`,
  );

  const spec = compileSearch(classification);
  const command = buildFindCommand(spec);
  const executor = context.executor ?? new ShellSearchExecutor({ cwd: context.cwd, logger });
  const entries = parseResults(await executor.run(command), { logger });
  logger.debug(`Found ${entries.length} result(s)`);

  const renderer = new ResultRenderer(spec, { colors, resultCount: entries.length });
  const { selected, missing } = resolveSelection(
    { indices: [...classification.selectorIndices] },
    entries,
  );
  const launcher =
    context.launcher ?? new SystemLauncher({ command: config.openCommand, logger });

  for (const entry of selected) {
    const line = renderer.render(entry);
    output.print(spec.outputMode === 'numbered' ? line.displayText : line.quotedPath);
    if (spec.openResults) {
      await openResult(line, launcher, output, logger);
    }
  }

  for (const index of missing) {
    output.print(missingResultMessage(index, spec.openResults));
  }

  if (spec.printCommand) {
    output.print(colors.gray(`Used command: ${command}`));
  }
}

async function openResult(
  line: RenderedLine,
  launcher: Launcher,
  output: Output,
  logger: Logger,
): Promise<void> {
  try {
    await launcher.open(line.targetPath);
  } catch (error: unknown) {
    if (!(error instanceof LaunchError)) {
      throw error;
    }
    logger.debug(`Launch failed for result ${line.index}: ${error.target}`);
    output.print(error.message);
  }
}
