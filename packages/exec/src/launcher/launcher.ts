import { spawn } from 'node:child_process';
import { LaunchError, errorMessage, silentLogger, type Logger } from '@findfile/shared';
import { parseCommandLine } from './commandLine';

/**
 * Hands a path to whatever opens it on this system.
 */
export interface Launcher {
  open(target: string): Promise<void>;
}

export function defaultOpenCommand(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'darwin':
      return 'open';
    case 'win32':
      return 'explorer';
    default:
      return 'xdg-open';
  }
}

export interface SystemLauncherOptions {
  command?: string;
  logger?: Logger;
}

/**
 * Starts the open command detached from this process, so the viewer keeps
 * running after `ff` exits. Resolves once the child has been spawned.
 */
export class SystemLauncher implements Launcher {
  private readonly command: string;
  private readonly logger: Logger;

  constructor(options: SystemLauncherOptions = {}) {
    this.command = options.command ?? defaultOpenCommand();
    this.logger = (options.logger ?? silentLogger).child({ component: 'launcher' });
  }

  open(target: string): Promise<void> {
    const { bin, args } = parseCommandLine(this.command);
    if (!bin) {
      return Promise.reject(
        new LaunchError(target, `Failed to open ${target}: open command is empty`),
      );
    }

    this.logger.debug(`Opening ${target} with ${bin}`);
    return new Promise<void>((resolve, reject) => {
      const fail = (cause: unknown) =>
        reject(
          new LaunchError(target, `Failed to open ${target}: ${errorMessage(cause)}`, { cause }),
        );

      try {
        const child = spawn(bin, [...args, target], {
          detached: true,
          stdio: 'ignore',
        });
        child.once('error', fail);
        child.once('spawn', () => {
          child.unref();
          resolve();
        });
      } catch (error: unknown) {
        fail(error);
      }
    });
  }
}
