/**
 * Manages tool settings: built-in defaults plus overrides from a JSON file
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { TitleRule } from './naming.js';

// Resolved settings (clean, no override fields)
export interface AppSettings {
  // Rendering options
  functionTrimPrefixes: string[];
  fileTrimPrefixes: string[];

  // Stack titles
  nameSkipRules: string[];
  nameTrimRules: string[];

  // Zip file handling
  zipFilePatterns: string[];
}

export const DEFAULT_SETTINGS: AppSettings = {
  functionTrimPrefixes: [],
  fileTrimPrefixes: [],
  nameSkipRules: [
    // Skip common low-level runtime frames.
    'runtime.gopark',
    'runtime.goparkunlock',
    'runtime.selectgo',
    'runtime.chanrecv',
    'runtime.chansend',
    'runtime.semacquire',
    'runtime.netpollblock',
    'internal/poll.runtime_pollWait',
    'sync.runtime_notifyListWait',
    'sync.runtime_Semacquire',
    'sync.runtime_SemacquireMutex',
  ],
  nameTrimRules: ['s|\\[[^\\]]*\\]||', 's|\\.func\\d+(\\.\\d+)?$||'],
  zipFilePatterns: ['^(.*/)?stacks\\.txt$'],
};

// Generic override for persistence
export interface Override {
  ignoreDefault?: boolean; // undefined = false = use defaults
  custom?: string[]; // undefined = [] for arrays
}

// What the settings file holds
export type StoredSettings = Partial<Record<keyof AppSettings, Override>>;

export const SETTINGS_FILE_NAME = '.goroutine-lens.json';

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

function resolveOverride(defaults: string[], override?: Override): string[] {
  const result: string[] = [];
  if (!override?.ignoreDefault) {
    result.push(...defaults);
  }
  // Add custom rules
  if (override?.custom) {
    result.push(...override.custom);
  }
  return result;
}

function resolveSettings(defaults: AppSettings, stored: StoredSettings): AppSettings {
  return {
    functionTrimPrefixes: resolveOverride(defaults.functionTrimPrefixes, stored.functionTrimPrefixes),
    fileTrimPrefixes: resolveOverride(defaults.fileTrimPrefixes, stored.fileTrimPrefixes),
    nameSkipRules: resolveOverride(defaults.nameSkipRules, stored.nameSkipRules),
    nameTrimRules: resolveOverride(defaults.nameTrimRules, stored.nameTrimRules),
    zipFilePatterns: resolveOverride(defaults.zipFilePatterns, stored.zipFilePatterns),
  };
}

function isSettingKey(key: string): key is keyof AppSettings {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed JSON against the StoredSettings shape
 */
function validateStoredSettings(value: unknown, source: string): StoredSettings {
  if (!isRecord(value)) {
    throw new SettingsError(`${source} must contain a JSON object`);
  }

  const stored: StoredSettings = {};
  for (const [key, override] of Object.entries(value)) {
    if (!isSettingKey(key)) {
      throw new SettingsError(`${source}: unknown setting '${key}'`);
    }
    if (!isRecord(override)) {
      throw new SettingsError(`${source}: '${key}' must be an object with ignoreDefault and/or custom`);
    }

    const { ignoreDefault, custom } = override;
    const entry: Override = {};
    if (typeof ignoreDefault === 'boolean') {
      entry.ignoreDefault = ignoreDefault;
    } else if (ignoreDefault !== undefined) {
      throw new SettingsError(`${source}: '${key}.ignoreDefault' must be boolean, got ${typeof ignoreDefault}`);
    }
    if (isStringArray(custom)) {
      entry.custom = custom;
    } else if (custom !== undefined) {
      const helpText = typeof custom === 'string' ? ` Convert "rule1\\nrule2" to ["rule1", "rule2"]` : '';
      throw new SettingsError(`${source}: '${key}.custom' must be string[]${helpText}`);
    }

    stored[key] = entry;
  }
  return stored;
}

export class SettingsManager {
  private settings: AppSettings;
  private storedSettings: StoredSettings = {};
  private defaultSettings: AppSettings;

  constructor(stored?: StoredSettings) {
    this.defaultSettings = { ...DEFAULT_SETTINGS };
    this.storedSettings = stored ?? {};
    this.settings = resolveSettings(this.defaultSettings, this.storedSettings);
  }

  /**
   * Load overrides from a settings file. An explicit path must exist; without
   * one, .goroutine-lens.json in the working directory is used when present.
   */
  static load(path?: string, cwd = process.cwd()): SettingsManager {
    const file = path ?? join(cwd, SETTINGS_FILE_NAME);
    if (!path && !existsSync(file)) {
      return new SettingsManager();
    }

    let raw: string;
    try {
      raw = readFileSync(file, 'utf8');
    } catch (error) {
      throw new SettingsError(`Failed to read settings from ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return SettingsManager.fromJSON(raw, file);
  }

  /**
   * Build from a JSON string holding StoredSettings
   */
  static fromJSON(jsonString: string, source = 'settings'): SettingsManager {
    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonString);
    } catch (error) {
      throw new SettingsError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return new SettingsManager(validateStoredSettings(parsed, source));
  }

  /**
   * Get current settings
   */
  getSettings(): AppSettings {
    return { ...this.settings };
  }

  getStoredSettings(): StoredSettings {
    return { ...this.storedSettings };
  }

  getDefaults(): AppSettings {
    return { ...this.defaultSettings };
  }

  getFunctionTrimPrefixes(): RegExp[] {
    return this.parseRegexPrefixes(this.settings.functionTrimPrefixes);
  }

  getFileTrimPrefixes(): RegExp[] {
    return this.parseRegexPrefixes(this.settings.fileTrimPrefixes);
  }

  /**
   * Get zip file patterns as regexes; invalid ones fall back to the default
   */
  getZipFilePatterns(): RegExp[] {
    return this.settings.zipFilePatterns.map(pattern => {
      try {
        return new RegExp(pattern);
      } catch (e) {
        console.warn(`Invalid zip file pattern regex "${pattern}", using default`);
        return /^(.*\/)?stacks\.txt$/;
      }
    });
  }

  /**
   * Skip and trim rules for stack titles
   */
  getTitleRules(): TitleRule[] {
    const clean = (rules: string[]) => rules.map(rule => rule.trim()).filter(rule => rule.length > 0);
    return [
      ...clean(this.settings.nameSkipRules).map(skip => ({ skip })),
      ...clean(this.settings.nameTrimRules).map(trim => ({ trim })),
    ];
  }

  /**
   * Compile prefix patterns, anchoring each at the start
   */
  parseRegexPrefixes(prefixArray: string[]): RegExp[] {
    return prefixArray
      .map(pattern => pattern.trim())
      .filter(pattern => pattern.length > 0)
      .map(pattern => {
        try {
          // If pattern doesn't start with ^, add it to anchor to beginning
          const anchoredPattern = pattern.startsWith('^') ? pattern : `^${pattern}`;
          return new RegExp(anchoredPattern);
        } catch (e) {
          console.warn(`Invalid regex pattern "${pattern}", matching it literally`);
          const escapedPattern = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
          return new RegExp(`^${escapedPattern}`);
        }
      });
  }
}
