/**
 * User Configuration
 *
 * Loads ~/.hilite/settings.json (or the file named by HILITE_CONFIG)
 * into the settings manager.
 */

import * as fs from 'fs';
import * as path from 'path';
import { debugLog } from '../debug.ts';
import type { Settings } from './settings.ts';

export type UserConfigResult =
  | { status: 'missing'; path: string }
  | { status: 'loaded'; path: string; rejected: string[] }
  | { status: 'invalid'; path: string; reason: string };

export function getUserConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.HILITE_CONFIG) {
    return env.HILITE_CONFIG;
  }
  const home = env.HOME || env.USERPROFILE || '';
  return path.join(home, '.hilite', 'settings.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply the user's settings file. A missing file is normal; an
 * unreadable or malformed one is logged and skipped.
 */
export function loadUserSettings(settings: Settings, configPath: string = getUserConfigPath()): UserConfigResult {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { status: 'missing', path: configPath };
    }
    const reason = error instanceof Error ? error.message : String(error);
    debugLog(`[Config] Cannot read ${configPath}: ${reason}`);
    return { status: 'invalid', path: configPath, reason };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    debugLog(`[Config] Malformed ${configPath}: ${reason}`);
    return { status: 'invalid', path: configPath, reason };
  }

  if (!isRecord(parsed)) {
    const reason = 'settings must be a JSON object';
    debugLog(`[Config] Malformed ${configPath}: ${reason}`);
    return { status: 'invalid', path: configPath, reason };
  }

  const rejected = settings.update(parsed);
  for (const key of rejected) {
    debugLog(`[Config] Ignoring setting '${key}'`);
  }
  return { status: 'loaded', path: configPath, rejected };
}
