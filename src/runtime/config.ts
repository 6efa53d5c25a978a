/**
 * Configuration loader for IMP.
 *
 * Loads imp.config.json from the script's directory, the working directory,
 * or a specified path. Provides interpreter settings and initial variables.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ImpError } from '../errors';

export interface ImpConfig {
  trace?: boolean;
  maxSteps?: number;
  /** Variables bound before the program runs. */
  variables?: Record<string, number>;
}

const CONFIG_FILENAMES = ['imp.config.json', '.imprc.json'];

/**
 * Load IMP configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. imp.config.json in cwd
 * 3. .imprc.json in cwd
 *
 * Returns empty config if no file is found.
 */
export function loadConfig(explicitPath?: string): ImpConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return {};
}

/**
 * Load config relative to a script file's directory, falling back to cwd.
 */
export function loadConfigForScript(scriptPath: string): ImpConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(scriptDir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return loadConfig();
}

function readConfigFile(filePath: string): ImpConfig {
  if (!fs.existsSync(filePath)) {
    throw new ImpError('ConfigError', `Config file not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ImpError('ConfigError', `Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

function validateConfig(raw: unknown, filePath: string): ImpConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ImpError('ConfigError', `Config in ${filePath} must be a JSON object`);
  }

  const config: ImpConfig = {};
  const fields: Map<string, unknown> = new Map(Object.entries(raw));
  const trace = fields.get('trace');
  const maxSteps = fields.get('maxSteps');
  const variables = fields.get('variables');

  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new ImpError('ConfigError', `Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  if (maxSteps !== undefined) {
    if (typeof maxSteps !== 'number' || !Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw new ImpError('ConfigError', `Invalid "maxSteps" in ${filePath}: must be a positive integer`);
    }
    config.maxSteps = maxSteps;
  }

  if (variables !== undefined) {
    if (typeof variables !== 'object' || variables === null || Array.isArray(variables)) {
      throw new ImpError('ConfigError', `Invalid "variables" in ${filePath}: must be an object`);
    }
    const bindings: [string, number][] = [];
    const entries: Map<string, unknown> = new Map(Object.entries(variables));
    for (const [name, value] of entries) {
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        throw new ImpError('ConfigError', `Variable "${name}" in ${filePath} must be an integer no larger than ${Number.MAX_SAFE_INTEGER} in magnitude`);
      }
      bindings.push([name, value]);
    }
    // fromEntries defines own properties, so a "__proto__" key survives
    config.variables = Object.fromEntries(bindings);
  }

  return config;
}
