/**
 * Settings Manager
 *
 * Editor configuration keyed by dotted names, as stored in settings.json.
 */

import { DEFAULT_SUPPORTED_TERMINALS } from '../terminal/ansi.ts';

export interface EditorSettings {
  'editor.statusBar.visible': boolean;
  'editor.tabInsertsTab': boolean;
  'files.saveOnExit': boolean;
  'terminal.supportedTypes': string[];
  'debug.enabled': boolean;
  'debug.logPath': string;
}

export type SettingKey = keyof EditorSettings;

const defaultSettings: EditorSettings = {
  'editor.statusBar.visible': true,
  'editor.tabInsertsTab': true,
  'files.saveOnExit': true,
  'terminal.supportedTypes': [...DEFAULT_SUPPORTED_TERMINALS],
  'debug.enabled': false,
  'debug.logPath': './debug.log',
};

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString = (value: unknown): value is string => typeof value === 'string';
const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const validators: { [K in SettingKey]: (value: unknown) => value is EditorSettings[K] } = {
  'editor.statusBar.visible': isBoolean,
  'editor.tabInsertsTab': isBoolean,
  'files.saveOnExit': isBoolean,
  'terminal.supportedTypes': isStringArray,
  'debug.enabled': isBoolean,
  'debug.logPath': isString,
};

type ListenerMap = { [K in SettingKey]?: Set<(value: EditorSettings[K]) => void> };

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

function copyDefaults(): EditorSettings {
  return {
    ...defaultSettings,
    'terminal.supportedTypes': [...defaultSettings['terminal.supportedTypes']],
  };
}

export class Settings {
  private settings: EditorSettings;
  private listeners: ListenerMap = {};

  constructor() {
    this.settings = copyDefaults();
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key);
    }
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings from parsed JSON. Returns the keys that were
   * unknown or had the wrong type; those are left unchanged.
   */
  update(partial: Record<string, unknown>): string[] {
    const rejected: string[] = [];
    for (const [key, value] of Object.entries(partial)) {
      if (!isSettingKey(key) || !this.trySet(key, value)) {
        rejected.push(key);
      }
    }
    return rejected;
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.settings = copyDefaults();
    for (const key of Object.keys(this.settings)) {
      if (isSettingKey(key)) {
        this.notifyListeners(key);
      }
    }
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(key: K, callback: (value: EditorSettings[K]) => void): () => void {
    const listenerMap: { [P in K]?: Set<(value: EditorSettings[P]) => void> } = this.listeners;
    const listeners: Set<(value: EditorSettings[K]) => void> = listenerMap[key] ?? new Set();
    listenerMap[key] = listeners;
    listeners.add(callback);

    return () => {
      listeners.delete(callback);
    };
  }

  private trySet<K extends SettingKey>(key: K, value: unknown): boolean {
    const validate: (value: unknown) => value is EditorSettings[K] = validators[key];
    if (!validate(value)) return false;
    this.set(key, value);
    return true;
  }

  private notifyListeners<K extends SettingKey>(key: K): void {
    const keyListeners: Set<(value: EditorSettings[K]) => void> | undefined = this.listeners[key];
    if (!keyListeners) return;

    const value = this.settings[key];
    for (const listener of keyListeners) {
      listener(value);
    }
  }
}

export const settings = new Settings();
