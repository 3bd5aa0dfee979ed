/**
 * .mobforge/ Config Loader
 *
 * Loads project settings from `.mobforge/config.json`. Missing keys fall
 * back to defaults; an unreadable file falls back entirely. Directories
 * are relative to the project root, the directory holding `.mobforge/`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_MOB_ROOT } from '@mobforge/mobs';
import { DEFAULT_HISTORY_LIMIT } from '@mobforge/editor';

// ============================================================================
// Config Types
// ============================================================================

export interface MobforgeConfig {
  /** Directory holding base `.mob` files and their patches */
  baseDir: string;
  /** Directory holding extended `.mob` files and their patches */
  extendedDir: string;
  /** Asset root prefixed to file paths when naming mobs */
  root: string;
  /** Undo steps kept by `edit` */
  historyLimit: number;
}

const DEFAULT_CONFIG: MobforgeConfig = {
  baseDir: 'assets/mobs',
  extendedDir: 'assets/extended/mobs',
  root: DEFAULT_MOB_ROOT,
  historyLimit: DEFAULT_HISTORY_LIMIT,
};

const ConfigFileSchema = z.object({
  baseDir: z.string().min(1),
  extendedDir: z.string().min(1),
  root: z.string(),
  historyLimit: z.number().int().positive(),
}).partial();

// ============================================================================
// Config Loading
// ============================================================================

export function projectRoot(configPath: string): string {
  return path.dirname(path.resolve(configPath));
}

function withResolvedDirs(config: MobforgeConfig, configPath: string): MobforgeConfig {
  const root = projectRoot(configPath);
  return {
    ...config,
    baseDir: path.resolve(root, config.baseDir),
    extendedDir: path.resolve(root, config.extendedDir),
  };
}

/**
 * Load config from .mobforge/config.json, with both mob directories
 * made absolute. Falls back to defaults if not found.
 */
export function loadConfig(configPath: string): MobforgeConfig {
  const configFile = path.join(configPath, 'config.json');

  if (!fs.existsSync(configFile)) {
    return withResolvedDirs(DEFAULT_CONFIG, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch {
    console.warn(`Warning: Failed to parse ${configFile}, using defaults`);
    return withResolvedDirs(DEFAULT_CONFIG, configPath);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error';
    console.warn(`Warning: Invalid ${configFile} (${detail}), using defaults`);
    return withResolvedDirs(DEFAULT_CONFIG, configPath);
  }
  return withResolvedDirs({ ...DEFAULT_CONFIG, ...parsed.data }, configPath);
}

/**
 * Get the default config as JSON string (for init command).
 */
export function getDefaultConfigJSON(): string {
  return JSON.stringify(DEFAULT_CONFIG, null, 2);
}

export { DEFAULT_CONFIG };
