import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  HarnessConfig,
  HarnessConfigInput,
  HarnessConfigSchema,
} from '@examplecheck/shared';

export const REPO_CONFIG_FILENAME = '.examplecheck.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Partial<HarnessConfigInput>; // CLI flags
  cwd?: string; // Library root (for repo config)
  env?: NodeJS.ProcessEnv; // Environment variables
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
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

  static load(options: ConfigOptions = {}): HarnessConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. Repo config: <libraryRoot>/.examplecheck.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILENAME));

    // 2. Explicit --config file
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      const configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(configPath);
    }

    // 3. Environment
    const envConfig: ConfigRecord = env.TARGET ? { target: env.TARGET } : {};

    // 4. CLI flags
    const flagConfig: ConfigRecord = options.flags || {};

    // Precedence: flags > env > explicit > repo
    let merged = this.mergeConfigs({}, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    if (typeof merged.target !== 'string' || merged.target.trim() === '') {
      throw new ConfigError(
        'No target specified. Set the TARGET environment variable or pass --target.',
      );
    }

    const result = HarnessConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
