#!/usr/bin/env tsx
/**
 * hilite - Terminal Text Editor
 *
 * Entry point for the application.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Editor } from './app.ts';
import { settings } from './config/settings.ts';
import { loadUserSettings } from './config/user-config.ts';
import { debugLog, getDebugLogPath, setDebugEnabled, setDebugLogPath } from './debug.ts';
import { StartupError } from './errors.ts';
import { assertAnsiTerminal } from './terminal/ansi.ts';
import { withRawSession } from './terminal/session.ts';

const VERSION = '0.1.0';

// Parse command line arguments
const args = process.argv.slice(2);

// Handle help flag
if (args.includes('--help') || args.includes('-h')) {
  console.log(`
hilite - Terminal Text Editor

Usage: hilite [options] [file]

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --debug                 Enable debug logging to debug.log

Keys:
  Arrows                  Move the cursor
  Backspace               Delete the character before the cursor
  Esc, Ctrl+C             Quit (the file is saved when modified)

`);
  process.exit(0);
}

// Handle version flag
if (args.includes('--version') || args.includes('-v')) {
  console.log(`hilite v${VERSION}`);
  process.exit(0);
}

const debugMode = args.includes('--debug');
const pathArg = args.filter((arg) => !arg.startsWith('-'))[0];

settings.onChange('debug.enabled', (enabled) => setDebugEnabled(enabled || debugMode));
settings.onChange('debug.logPath', setDebugLogPath);
setDebugEnabled(debugMode);
loadUserSettings(settings);

// Set while the raw session is running, so a crash can end it first
let activeEditor: Editor | null = null;
let crashed = false;

function handleCrash(label: string, detail: string): void {
  debugLog(`[CRASH] ${label}:\n${detail}`);
  crashed = true;

  // Stopping the editor unwinds through withRawSession, which restores
  // the terminal; main then exits with code 1
  if (activeEditor) {
    activeEditor.stop();
  } else {
    process.exit(1);
  }
}

process.on('uncaughtException', (error: Error) => {
  handleCrash('Uncaught Exception', error.stack || error.message);
});

process.on('unhandledRejection', (reason: unknown) => {
  handleCrash('Unhandled Rejection', reason instanceof Error ? reason.stack ?? reason.message : String(reason));
});

/**
 * File contents, or undefined for a file that does not exist yet.
 */
function readInitialContent(filePath: string): Uint8Array | undefined {
  try {
    return fs.readFileSync(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      debugLog(`[Main] ${filePath} does not exist, starting empty`);
      return undefined;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  try {
    assertAnsiTerminal(process.env.TERM, settings.get('terminal.supportedTypes'));
  } catch (error) {
    if (error instanceof StartupError) {
      process.stderr.write(`hilite: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const filePath = pathArg ? path.resolve(process.cwd(), pathArg) : undefined;
  const initialContent = filePath ? readInitialContent(filePath) : undefined;

  debugLog(`[Main] Starting${filePath ? ` with ${filePath}` : ''}`);

  const result = await withRawSession({ input: process.stdin, output: process.stdout }, async () => {
    const editor = new Editor({
      initialContent,
      input: process.stdin,
      output: (data) => process.stdout.write(data),
      getSize: () => ({ width: process.stdout.columns || 80, height: process.stdout.rows || 24 }),
      settings,
      fileName: filePath ? path.basename(filePath) : undefined,
    });

    const onResize = () => editor.render();
    const onSignal = (signal: NodeJS.Signals) => {
      debugLog(`[Main] Received ${signal}, quitting`);
      editor.stop();
    };
    process.stdout.on('resize', onResize);
    process.on('SIGTERM', onSignal);
    process.on('SIGHUP', onSignal);

    activeEditor = editor;
    try {
      return await editor.run();
    } finally {
      activeEditor = null;
      process.stdout.removeListener('resize', onResize);
      process.removeListener('SIGTERM', onSignal);
      process.removeListener('SIGHUP', onSignal);
    }
  });

  if (crashed) {
    process.stderr.write(`hilite: unexpected error, details in ${getDebugLogPath()} when run with --debug\n`);
    return 1;
  }

  if (filePath && result.modified && settings.get('files.saveOnExit')) {
    fs.writeFileSync(filePath, result.content);
    debugLog(`[Main] Wrote ${result.content.length} bytes to ${filePath}`);
  }

  debugLog('[Main] Exited normally');
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const msg = `[Main] Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`;
    debugLog(msg);
    process.stderr.write(`${msg}\n`);
    process.exit(1);
  });
