import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { parseConfig, Config } from '../schemas/config.js';
import { ConfigError } from '../errors/index.js';

export const CONFIG_DIR = '.annobatch';
export const CONFIG_FILE = 'config.yaml';

export interface OutputPaths {
  dir: string;
  csv: string;
  manifest: string;
  page: string;
}

export function configPath(projectPath: string): string {
  return join(projectPath, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load `.annobatch/config.yaml`, falling back to defaults when the file is absent.
 */
export function loadConfig(projectPath: string): Config {
  const path = configPath(projectPath);
  if (!existsSync(path)) {
    return parseConfig({});
  }

  let data: unknown;
  try {
    data = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${CONFIG_DIR}/${CONFIG_FILE}: ${message}`, path);
  }

  try {
    // An empty file loads as undefined
    return parseConfig(data ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, path);
    }
    throw error;
  }
}

export function resolveFrom(projectPath: string, p: string): string {
  return isAbsolute(p) ? p : resolve(projectPath, p);
}

export function resolveDatasetPath(config: Config, projectPath: string): string {
  return resolveFrom(projectPath, config.dataset.path);
}

export function resolveOutputPaths(config: Config, projectPath: string): OutputPaths {
  const dir = resolveFrom(projectPath, config.output.dir);
  return {
    dir,
    csv: resolveFrom(dir, config.output.csv),
    manifest: resolveFrom(dir, config.output.manifest),
    page: resolveFrom(dir, config.output.page),
  };
}
