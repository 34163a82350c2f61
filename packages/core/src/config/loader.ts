import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, DumpConfigSchema, type DumpConfig, type DumpConfigInput } from '@treedump/shared';

export const USER_CONFIG_DIR = '.treedump';
export const USER_CONFIG_FILE = 'config.yaml';
export const REPO_CONFIG_FILE = '.treedump.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Partial<DumpConfigInput>; // CLI flags
  cwd?: string; // Traversal root (for repo config)
  homeDir?: string; // User config location, defaults to os.homedir()
}

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw new ConfigError(`Cannot read config file: ${filePath}`, { cause: error });
    }

    // An empty file parses to undefined.
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
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

  static load(options: ConfigOptions = {}): DumpConfig {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.treedump/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_DIR, USER_CONFIG_FILE));

    // 2. Repo config: <root>/.treedump.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigLayer = { ...(options.flags ?? {}) };

    // Merge in order of precedence: flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    // Defaults come from the schema
    const result = DumpConfigSchema.safeParse(merged);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
