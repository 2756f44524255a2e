/**
 * Raw Terminal Session
 *
 * Switches the terminal into immediate, unechoed input on the alternate
 * screen and restores it afterwards. Node's raw TTY mode clears ICANON,
 * ECHO and IXON, so flow-control keys reach the editor as plain bytes.
 */

import { CURSOR, SCREEN, STYLE } from './ansi.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Types
// ============================================

export interface TerminalInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput {
  write(data: string): unknown;
}

export interface TerminalIO {
  input: TerminalInput;
  output: TerminalOutput;
}

/**
 * Input mode in effect before the session began.
 */
export interface SavedTerminalMode {
  readonly wasRaw: boolean;
}

// ============================================
// Raw Session
// ============================================

export class RawSession {
  private active = false;

  constructor(private readonly io: TerminalIO) {}

  isActive(): boolean {
    return this.active;
  }

  /**
   * Enter the alternate screen and raw input mode.
   */
  begin(): SavedTerminalMode {
    if (this.active) {
      throw new Error('Raw session already started');
    }

    const { input, output } = this.io;
    const saved: SavedTerminalMode = { wasRaw: input.isRaw === true };

    output.write(SCREEN.enterAlt + SCREEN.clear + CURSOR.home);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(true);
    }

    this.active = true;
    debugLog(`[Session] Raw mode on (previously ${saved.wasRaw ? 'raw' : 'canonical'})`);
    return saved;
  }

  /**
   * Restore the saved input mode and the primary screen. Runs once;
   * later calls do nothing.
   */
  end(saved: SavedTerminalMode): void {
    if (!this.active) return;
    this.active = false;

    const { input, output } = this.io;
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(saved.wasRaw);
    }
    output.write(STYLE.reset + CURSOR.show + SCREEN.exitAlt);
    debugLog('[Session] Terminal restored');
  }
}

/**
 * Run `body` inside a raw session. The terminal is restored however
 * `body` finishes.
 */
export async function withRawSession<T>(
  io: TerminalIO,
  body: (session: RawSession) => Promise<T>
): Promise<T> {
  const session = new RawSession(io);
  const saved = session.begin();
  try {
    return await body(session);
  } finally {
    session.end(saved);
  }
}
