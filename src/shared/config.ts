/**
 * Configuration management for repotree
 */

import { existsSync, readFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULTS = {
  // Storage
  DATA_DIR: join(homedir(), '.repotree'),
  HISTORY_DB: 'history.db',
  HISTORY_ENABLED: 'true',

  // Logging
  LOG_LEVEL: 'INFO',

  // Layout
  LAYOUT_FILE: 'repotree.txt',
  INDENT_WIDTH: '', // empty: detect from the first indented line

  // Version control
  GIT_BINARY: 'git',
};

export type ConfigKey = keyof typeof DEFAULTS;

export type Settings = Record<ConfigKey, string>;

const ENV_PREFIX = 'REPOTREE_';

const CONFIG_KEYS = Object.keys(DEFAULTS).filter(
  (key): key is ConfigKey => key in DEFAULTS
);

// ============================================================================
// Paths
// ============================================================================

export function getDataDir(): string {
  return process.env[`${ENV_PREFIX}DATA_DIR`] || DEFAULTS.DATA_DIR;
}

export function getSettingsPath(): string {
  return join(getDataDir(), 'settings.yaml');
}

export function getHistoryDbPath(): string {
  return join(getDataDir(), getSetting('HISTORY_DB'));
}

// ============================================================================
// Settings Manager
// ============================================================================

function readSettingsFile(settingsPath: string): Partial<Settings> {
  if (!existsSync(settingsPath)) {
    return {};
  }

  const loaded: unknown = parseYaml(readFileSync(settingsPath, 'utf-8'));
  if (loaded === null || typeof loaded !== 'object' || Array.isArray(loaded)) {
    return {};
  }

  const result: Partial<Settings> = {};
  for (const [key, value] of Object.entries(loaded)) {
    const configKey = CONFIG_KEYS.find(k => k === key);
    if (configKey && value !== null && value !== undefined) {
      result[configKey] = String(value);
    }
  }
  return result;
}

/**
 * Defaults, overlaid by settings.yaml, overlaid by REPOTREE_* environment variables.
 */
export function loadSettings(): Settings {
  let fromFile: Partial<Settings> = {};
  try {
    fromFile = readSettingsFile(getSettingsPath());
  } catch (err) {
    // Broken settings file: fall back to defaults rather than refusing to run
    console.error('[config] Failed to read settings.yaml, using defaults:', err);
  }

  const settings: Settings = { ...DEFAULTS };
  for (const key of CONFIG_KEYS) {
    const envValue = process.env[`${ENV_PREFIX}${key}`];
    const fileValue = fromFile[key];
    if (envValue !== undefined && envValue !== '') {
      settings[key] = envValue;
    } else if (fileValue !== undefined) {
      settings[key] = fileValue;
    }
  }
  return settings;
}

export function getSetting(key: ConfigKey): string {
  return loadSettings()[key];
}

export function getSettingInt(key: ConfigKey): number | undefined {
  const parsed = parseInt(getSetting(key), 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function getSettingBool(key: ConfigKey): boolean {
  return getSetting(key).toLowerCase() === 'true';
}

// ============================================================================
// Utilities
// ============================================================================

export function ensureDataDir(): void {
  const dataDir = getDataDir();
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}
