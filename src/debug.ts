/**
 * Debug Logging
 *
 * Appends timestamped lines to a log file. Disabled unless --debug is
 * passed or the debug.enabled setting is on. The terminal belongs to the
 * editor while a session is active, so nothing here touches stdout.
 */

import { appendFileSync } from 'fs';

let debugEnabled = false;
let debugLogPath = './debug.log';

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function setDebugLogPath(path: string): void {
  debugLogPath = path;
}

export function getDebugLogPath(): string {
  return debugLogPath;
}

export function debugLog(message: string): void {
  if (!debugEnabled) return;

  const timestamp = new Date().toISOString();
  try {
    appendFileSync(debugLogPath, `[${timestamp}] ${message}\n`);
  } catch {
    // Ignore write errors
  }
}
