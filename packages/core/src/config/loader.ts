import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  ConfigSchema,
  applicationDirectories,
  resolveBaseDirectories,
  type BaseDirectories,
  type Config,
  type DeepPartial,
  type Env,
} from '@swiftlaunch/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: DeepPartial<Config>; // CLI flags
  env?: Env; // Environment variables
  home?: string;
}

/**
 * Locations derived from the config and the XDG base directories.
 */
export interface ResolvedPaths {
  directories: string[];
  /** null when the entry cache is disabled */
  cachePath: string | null;
  historyPath: string;
  socketPath: string;
  iconDataDirs: string[];
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Error parsing YAML file: ${filePath}\nTop level must be a mapping`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static userConfigPath(env: Env = process.env, home: string = os.homedir()): string {
    return path.join(resolveBaseDirectories(env, home).configHome, 'swiftlaunch', 'config.yaml');
  }

  static load(options: ConfigOptions = {}): Config {
    const env = options.env ?? process.env;
    const home = options.home ?? os.homedir();

    // 1. User config: $XDG_CONFIG_HOME/swiftlaunch/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath(env, home));

    // 2. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 3. CLI flags
    const flagConfig: ConfigRecord = options.flags ?? {};

    // Precedence: flags > explicit > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }

  static resolvePaths(config: Config, env: Env = process.env, home: string = os.homedir()): ResolvedPaths {
    const base: BaseDirectories = resolveBaseDirectories(env, home);
    const uid = typeof process.getuid === 'function' ? String(process.getuid()) : 'user';
    return {
      directories: config.scanner.directories ?? applicationDirectories(base),
      cachePath: config.index.cacheEnabled
        ? (config.index.cachePath ?? path.join(base.cacheHome, 'swiftlaunch', 'entries.bin'))
        : null,
      historyPath: config.launcher.historyPath ?? path.join(base.stateHome, 'swiftlaunch', 'history.json'),
      socketPath:
        config.daemon.socketPath ??
        (base.runtimeDir
          ? path.join(base.runtimeDir, 'swiftlaunch.sock')
          : path.join(os.tmpdir(), `swiftlaunch-${uid}.sock`)),
      iconDataDirs: [base.dataHome, ...base.dataDirs],
    };
  }
}
