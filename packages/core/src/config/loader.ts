import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, PackConfigSchema, type PackConfig } from '@codepack/shared';
import { isSupportedEncoding } from '@codepack/repo';

/** Project config file looked up in the run root. */
export const PROJECT_CONFIG_FILE = '.codepack.yaml';

export interface ConfigOptions {
  /** Run root, searched for {@link PROJECT_CONFIG_FILE} */
  root: string;
  /** Explicit --config file; must exist */
  configPath?: string;
  /** CLI flags, validated with the rest; undefined values are ignored */
  flags?: Readonly<Record<string, unknown>>;
}

export interface LoadedConfig {
  config: PackConfig;
  /** Files that contributed, lowest precedence first */
  sources: string[];
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  /**
   * Parses a YAML config file. Returns undefined when the file is absent; an
   * empty file is an empty config.
   */
  static loadYaml(filePath: string): RawConfig | undefined {
    if (!fs.existsSync(filePath)) return undefined;

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw new ConfigError(`Cannot read config file: ${filePath}`, { cause: error });
    }

    if (parsed === undefined || parsed === null) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a mapping`);
    }
    return parsed;
  }

  /**
   * Shallow merge; undefined values in `source` leave `target` unchanged.
   * Arrays replace.
   */
  static mergeConfigs(target: RawConfig, source: RawConfig): RawConfig {
    const output = { ...target };
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) output[key] = value;
    }
    return output;
  }

  /**
   * Resolves the effective configuration.
   *
   * Precedence, lowest first: schema defaults, `<root>/.codepack.yaml`,
   * the explicit config file, flags.
   *
   * @throws ConfigError listing every validation issue.
   */
  static load(options: ConfigOptions): LoadedConfig {
    const sources: string[] = [];
    let merged: RawConfig = {};

    const projectPath = path.join(path.resolve(options.root), PROJECT_CONFIG_FILE);
    const projectConfig = this.loadYaml(projectPath);
    if (projectConfig) {
      merged = this.mergeConfigs(merged, projectConfig);
      sources.push(projectPath);
    }

    if (options.configPath) {
      const explicitPath = path.resolve(options.configPath);
      const explicitConfig = this.loadYaml(explicitPath);
      if (!explicitConfig) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      merged = this.mergeConfigs(merged, explicitConfig);
      sources.push(explicitPath);
    }

    merged = this.mergeConfigs(merged, { ...options.flags });

    return { config: this.validate(merged), sources };
  }

  static validate(raw: unknown): PackConfig {
    const result = PackConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const unsupported = result.data.fallbackEncodings
      .map((label, index) => ({ label, index }))
      .filter(({ label }) => !isSupportedEncoding(label));
    if (unsupported.length > 0) {
      const issues = unsupported
        .map(({ label, index }) => `- fallbackEncodings.${index}: Unsupported encoding "${label}"`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
