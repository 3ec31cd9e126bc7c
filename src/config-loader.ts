/**
 * Config Loader - Loads and merges coursepack configuration files
 *
 * File format, one setting per line:
 *
 *   # comment
 *   strict = true
 *   output.format = json
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_AUDIT_LOG_PATH, DEFAULT_AUDIT_MAX_SIZE } from './audit-logger';
import { describeError } from './errors';
import {
  ConfigSource,
  type ConfigError,
  type ConfigKey,
  type ConfigLoadResult,
  type InspectorConfig
} from './types';

export type ConfigLocations = Record<ConfigSource, string>;

export function defaultConfigLocations(): ConfigLocations {
  return {
    [ConfigSource.GLOBAL]: '/etc/coursepack/config',
    [ConfigSource.USER]: path.join(os.homedir(), '.config', 'coursepack', 'config'),
    [ConfigSource.PROJECT]: path.join(process.cwd(), '.coursepackrc')
  };
}

export const DEFAULT_CONFIG: InspectorConfig = {
  strict: false,
  audit: {
    enabled: true,
    path: DEFAULT_AUDIT_LOG_PATH,
    maxSize: DEFAULT_AUDIT_MAX_SIZE
  },
  output: {
    format: 'text',
    color: true,
    verbose: false
  }
};

const BOOLEAN_KEYS: ReadonlySet<string> = new Set(['strict', 'audit.enabled', 'output.color', 'output.verbose']);

const KEYS: readonly ConfigKey[] = [
  'strict',
  'audit.enabled',
  'audit.path',
  'audit.max_size',
  'output.format',
  'output.color',
  'output.verbose'
];

function isConfigKey(key: string): key is ConfigKey {
  return KEYS.some(known => known === key);
}

function parseBoolean(value: string): boolean | null {
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
    case 'on':
    case '1':
      return true;
    case 'false':
    case 'no':
    case 'off':
    case '0':
      return false;
    default:
      return null;
  }
}

export class ConfigLoader {
  private readonly locations: ConfigLocations;

  constructor(locations: ConfigLocations = defaultConfigLocations()) {
    this.locations = locations;
  }

  /**
   * Parse a single config file. A missing file is not an error.
   */
  parse(filePath: string, source: ConfigSource): ConfigLoadResult {
    const values: ConfigLoadResult['values'] = {};
    const errors: ConfigError[] = [];

    if (!fs.existsSync(filePath)) {
      return { values, errors };
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      errors.push({ line: 0, message: `Cannot read file: ${describeError(error)}`, source });
      return { values, errors };
    }

    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const lineNumber = i + 1;
      const line = lines[i].trim();

      if (line === '' || line.startsWith('#')) {
        continue;
      }

      try {
        const [key, value] = this.parseLine(line);
        values[key] = value;
      } catch (error) {
        errors.push({ line: lineNumber, message: describeError(error), source });
      }
    }

    return { values, errors };
  }

  private parseLine(line: string): [ConfigKey, string] {
    const separator = line.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid config syntax: ${line}`);
    }

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (!isConfigKey(key)) {
      throw new Error(`Unknown config key: ${key}`);
    }
    if (BOOLEAN_KEYS.has(key) && parseBoolean(value) === null) {
      throw new Error(`${key} must be true or false, got '${value}'`);
    }
    if (key === 'audit.max_size' && !/^\d+$/.test(value)) {
      throw new Error(`audit.max_size must be a byte count, got '${value}'`);
    }
    if (key === 'output.format' && value !== 'text' && value !== 'json') {
      throw new Error(`output.format must be text or json, got '${value}'`);
    }
    if (key === 'audit.path' && value === '') {
      throw new Error('audit.path must not be empty');
    }

    return [key, value];
  }

  /**
   * Load global, user and project files in that order; later files
   * override earlier ones key by key. Errors are reported on stderr.
   */
  loadAll(): InspectorConfig {
    const merged: ConfigLoadResult['values'] = {};

    for (const source of [ConfigSource.GLOBAL, ConfigSource.USER, ConfigSource.PROJECT]) {
      const result = this.parse(this.locations[source], source);
      Object.assign(merged, result.values);
      this.logErrors(result.errors, this.locations[source]);
    }

    return ConfigLoader.toConfig(merged);
  }

  /** Apply already-validated values over the defaults */
  static toConfig(values: ConfigLoadResult['values']): InspectorConfig {
    const bool = (value: string | undefined, fallback: boolean): boolean =>
      value === undefined ? fallback : parseBoolean(value) ?? fallback;

    const format = values['output.format'];
    const maxSize = values['audit.max_size'];

    return {
      strict: bool(values.strict, DEFAULT_CONFIG.strict),
      audit: {
        enabled: bool(values['audit.enabled'], DEFAULT_CONFIG.audit.enabled),
        path: values['audit.path'] ?? DEFAULT_CONFIG.audit.path,
        maxSize: maxSize === undefined ? DEFAULT_CONFIG.audit.maxSize : Number.parseInt(maxSize, 10)
      },
      output: {
        format: format === 'json' || format === 'text' ? format : DEFAULT_CONFIG.output.format,
        color: bool(values['output.color'], DEFAULT_CONFIG.output.color),
        verbose: bool(values['output.verbose'], DEFAULT_CONFIG.output.verbose)
      }
    };
  }

  private logErrors(errors: ConfigError[], filePath: string): void {
    for (const error of errors) {
      console.error(`Warning: ${filePath}:${error.line}: ${error.message}`);
    }
  }
}
