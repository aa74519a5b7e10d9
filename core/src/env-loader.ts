import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import process from 'node:process';
import type { Logger } from './logger.js';

export interface EnvLoaderOptions {
  /** Directory to start searching from. Defaults to `process.cwd()`. */
  cwd?: string;
  logger?: Partial<Logger>;
}

export interface EnvLoaderResult {
  loaded: string[];
}

function declaresWorkspaces(packageJsonPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    return false;
  }
}

function findWorkspaceRoot(startDir: string): string | null {
  let current = startDir;
  const root = resolve('/');
  while (current !== root) {
    const packageJsonPath = resolve(current, 'package.json');
    if (existsSync(packageJsonPath) && declaresWorkspaces(packageJsonPath)) {
      return current;
    }
    current = dirname(current);
  }
  return null;
}

/**
 * Load environment variables from .env files.
 *
 * Searches for .env files in the following order (first file found takes priority):
 * 1. Workspace root (the nearest package.json declaring `workspaces`)
 * 2. The starting directory (as fallback)
 *
 * Variables already present in `process.env` are never overridden.
 */
export function loadEnv(options: EnvLoaderOptions = {}): EnvLoaderResult {
  const startDir = resolve(options.cwd ?? process.cwd());
  const workspaceRoot = findWorkspaceRoot(startDir);
  const loaded: string[] = [];

  if (workspaceRoot) {
    const rootEnvPath = resolve(workspaceRoot, '.env');
    if (existsSync(rootEnvPath)) {
      const result = dotenvConfig({ path: rootEnvPath, override: false });
      if (result.parsed) {
        loaded.push(rootEnvPath);
        options.logger?.debug?.('core.env.loaded', { path: rootEnvPath });
      }
    }
  }

  const localEnvPath = resolve(startDir, '.env');
  if (!loaded.includes(localEnvPath) && existsSync(localEnvPath)) {
    const result = dotenvConfig({ path: localEnvPath, override: false });
    if (result.parsed) {
      loaded.push(localEnvPath);
      options.logger?.debug?.('core.env.loaded.fallback', { path: localEnvPath });
    }
  }

  return { loaded };
}
