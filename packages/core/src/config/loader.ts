import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@leansmith/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: Partial<ConfigInput>; // CLI flags
  cwd?: string; // directory holding the repo config
  env?: NodeJS.ProcessEnv;
  homeDir?: string; // directory holding the user config
}

export const USER_CONFIG_DIR = '.leansmith';
export const REPO_CONFIG_FILE = '.leansmith.yaml';

type ConfigRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePositiveInt(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim()) || Number(raw) <= 0) {
    throw new ConfigError(`Invalid value for ${name}: '${raw}' (expected a positive integer)`);
  }
  return Number(raw);
}

function parseNonNegativeInt(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`Invalid value for ${name}: '${raw}' (expected a non-negative integer)`);
  }
  return Number(raw);
}

function parseSeconds(name: string, raw: string): number {
  const seconds = Number(raw);
  if (!raw.trim() || !Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`Invalid value for ${name}: '${raw}' (expected seconds)`);
  }
  return Math.round(seconds * 1000);
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
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /** Objects merge key by key; arrays and primitives replace. */
  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static validate(raw: ConfigRecord): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }

  /**
   * Environment overrides on top of the file configuration. Model variables
   * change the model of whichever provider the role points at.
   */
  static applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
    const next = structuredClone(config);

    const setModel = (providerId: string, model: string | undefined) => {
      const provider = next.providers[providerId];
      if (model && provider) {
        provider.model = model;
      }
    };
    const plannerModel = env.PLANNER_MODEL || env.GPT4_MODEL;
    setModel(next.defaults.planner, plannerModel);
    setModel(next.defaults.generator, plannerModel);
    setModel(next.defaults.verifier, env.VERIFIER_MODEL || env.GPT3_MODEL);

    const { retrieval } = next;
    if (env.EMBEDDING_MODEL) retrieval.embeddings.model = env.EMBEDDING_MODEL;
    if (env.CHUNK_SIZE) retrieval.chunkSize = parsePositiveInt('CHUNK_SIZE', env.CHUNK_SIZE);
    if (env.OVERLAP_SIZE) retrieval.overlapSize = parseNonNegativeInt('OVERLAP_SIZE', env.OVERLAP_SIZE);
    if (env.MAX_CHUNKS) retrieval.maxChunks = parsePositiveInt('MAX_CHUNKS', env.MAX_CHUNKS);
    if (env.LEAN_TIMEOUT) next.compiler.timeoutMs = parseSeconds('LEAN_TIMEOUT', env.LEAN_TIMEOUT);
    if (env.RETRY_DELAY) next.retry.initialDelayMs = parseSeconds('RETRY_DELAY', env.RETRY_DELAY);

    return next;
  }

  /**
   * Precedence, lowest first: user file, repo file, --config file,
   * environment, flags.
   */
  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    const homeDir = options.homeDir ?? os.homedir();

    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_DIR, 'config.yaml'));
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(explicitPath);
    }

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);

    const fromFiles = this.applyEnvOverrides(this.validate(merged), env);
    if (!options.flags) {
      return this.validate(fromFiles);
    }
    return this.validate(this.mergeConfigs(fromFiles, options.flags));
  }
}
