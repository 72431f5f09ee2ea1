import { execa, ExecaError } from 'execa';
import { ProcessError, silentLogger, type Logger } from '@findfile/shared';

/**
 * Runs a rendered search command and returns what it wrote to stdout.
 */
export interface SearchExecutor {
  run(command: string): Promise<string>;
}

export interface ShellSearchOptions {
  cwd?: string;
  logger?: Logger;
}

export class ShellSearchExecutor implements SearchExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: ShellSearchOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'search' });
  }

  async run(command: string): Promise<string> {
    this.logger.debug(`Running: ${command}`);
    try {
      const { stdout } = await execa(command, {
        shell: true,
        cwd: this.options.cwd,
        stripFinalNewline: false,
      });
      return stdout;
    } catch (error: unknown) {
      if (error instanceof ExecaError) {
        throw new ProcessError(`Search command failed: ${error.shortMessage}`, {
          cause: error,
          exitCode: error.exitCode,
          details: { command, stderr: String(error.stderr ?? '').trim() },
        });
      }
      throw error;
    }
  }
}
