import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, FindConfigSchema, type FindConfig } from '@findfile/shared';
import type { FolderContext } from '../query/folders';

export const ENV_DEFAULT_DIR = 'FF_DEFAULT_DIR';
export const ENV_OPEN_COMMAND = 'FF_OPEN_COMMAND';
export const ENV_COLOR = 'FF_COLOR';
export const ENV_LOG_LEVEL = 'FF_LOG_LEVEL';
export const ENV_CONFIG = 'FF_CONFIG';

export interface ConfigOptions {
  env?: NodeJS.ProcessEnv; // Environment variables
  homeDir?: string;
  configPath?: string; // Explicit file; must exist
}

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

export class ConfigLoader {
  static defaultConfigPath(env: NodeJS.ProcessEnv, homeDir: string): string {
    const configHome = nonBlank(env.XDG_CONFIG_HOME) ?? path.join(homeDir, '.config');
    return path.join(configHome, 'findfile', 'config.yaml');
  }

  static loadYaml(filePath: string): Record<string, unknown> {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return { ...parsed };
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    const defaultFolder = nonBlank(env[ENV_DEFAULT_DIR]);
    if (defaultFolder) overrides.defaultFolder = defaultFolder;
    const openCommand = nonBlank(env[ENV_OPEN_COMMAND]);
    if (openCommand) overrides.openCommand = openCommand;
    const color = nonBlank(env[ENV_COLOR]);
    if (color) overrides.color = color.trim().toLowerCase();
    const logLevel = nonBlank(env[ENV_LOG_LEVEL]);
    if (logLevel) overrides.logLevel = logLevel.trim().toLowerCase();
    return overrides;
  }

  static load(options: ConfigOptions = {}): FindConfig {
    const env = options.env || process.env;
    const homeDir = options.homeDir || os.homedir();

    // 1. Config file: explicit path, $FF_CONFIG, or the XDG location
    const explicitPath = options.configPath ?? nonBlank(env[ENV_CONFIG]);
    if (explicitPath && !fs.existsSync(explicitPath)) {
      throw new ConfigError(`Config file not found: ${explicitPath}`);
    }
    const fileConfig = this.loadYaml(explicitPath ?? this.defaultConfigPath(env, homeDir));

    // 2. Environment overrides the file
    const merged = { ...fileConfig, ...this.fromEnv(env) };

    const result = FindConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}

export function createFolderContext(
  config: Pick<FindConfig, 'defaultFolder'>,
  locations: { homeDir: string; cwd: string },
): FolderContext {
  return {
    homeDir: locations.homeDir,
    cwd: locations.cwd,
    parentDir: path.dirname(locations.cwd),
    defaultFolder: config.defaultFolder,
  };
}
