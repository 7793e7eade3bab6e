import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { type Config, ConfigSchema } from '../parser/config-schema.ts';
import { ConsoleLogger, type Logger } from './logger.ts';
import { PathResolver } from './paths.ts';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  private static instance: Config | undefined;

  public static getSecret(key: string): string | undefined {
    return process.env[key];
  }

  private static deepMerge(target: PlainObject, source: PlainObject): PlainObject {
    const output: PlainObject = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = output[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        output[key] = ConfigLoader.deepMerge(existing, value);
      } else {
        output[key] = value;
      }
    }
    return output;
  }

  /**
   * Replace `${VAR}` and `$VAR` with environment values (empty when unset).
   */
  static interpolateEnv(content: string): string {
    return content.replace(
      /\$\{([^}]+)\}|\$([a-zA-Z_][a-zA-Z0-9_]*)/g,
      (_match: string, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare ?? '';
        return process.env[name] ?? '';
      }
    );
  }

  static load(logger: Logger = new ConsoleLogger()): Config {
    if (ConfigLoader.instance) return ConfigLoader.instance;

    const configPaths = PathResolver.getConfigPaths();
    let merged: PlainObject = {};

    // Lowest precedence first so later files win
    for (const path of [...configPaths].reverse()) {
      if (!existsSync(path)) continue;
      try {
        const content = ConfigLoader.interpolateEnv(readFileSync(path, 'utf8'));
        const parsed: unknown = yaml.load(content);
        if (isPlainObject(parsed)) {
          merged = ConfigLoader.deepMerge(merged, parsed);
        }
      } catch (error) {
        logger.warn(`Warning: Failed to load config from ${path}: ${String(error)}`);
      }
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      logger.warn(`Warning: Invalid configuration, using defaults: ${result.error.message}`);
      ConfigLoader.instance = ConfigSchema.parse({});
    } else {
      ConfigLoader.instance = result.data;
    }

    return ConfigLoader.instance;
  }

  /**
   * For testing purposes, manually set the configuration
   */
  static setConfig(config: Config): void {
    ConfigLoader.instance = config;
  }

  /**
   * For testing purposes, clear the cached configuration
   */
  static clear(): void {
    ConfigLoader.instance = undefined;
  }

  /**
   * Pick the provider for a model name.
   * Order: explicit `provider:` prefix, exact mapping, `prefix*` mapping,
   * then `fallback` (the configured default unless given).
   */
  static getProviderForModel(
    model: string,
    config: Config = ConfigLoader.load(),
    fallback: string = config.default_provider
  ): string {
    if (model.includes(':')) {
      const [provider] = model.split(':');
      if (config.providers[provider]) {
        return provider;
      }
    }

    const exact = config.model_mappings[model];
    if (exact) return exact;

    for (const [pattern, provider] of Object.entries(config.model_mappings)) {
      if (pattern.endsWith('*') && model.startsWith(pattern.slice(0, -1))) {
        return provider;
      }
    }

    return fallback;
  }
}
