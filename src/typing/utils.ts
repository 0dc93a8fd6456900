/**
 * Shared terminal utilities
 *
 * The typing test draws onto anything shaped like an xterm.js Terminal.
 * The theme must be configured by the consuming application via setTheme().
 */

import type { IDisposable } from '@xterm/xterm';
import { type ThemeName, type ThemePalette, getPalette } from '../themes';
import type { KeyInput } from './actions';

// ============================================================================
// Terminal Surface
// ============================================================================

export interface TerminalKeyEvent {
  key: string;
  domEvent: KeyInput & {
    preventDefault?: () => void;
    stopPropagation?: () => void;
  };
}

/**
 * The part of an xterm.js Terminal the typing test uses.
 * A real `Terminal` satisfies it; so does the Node stdin/stdout adapter.
 */
export interface TypingTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  onKey(listener: (event: TerminalKeyEvent) => void): IDisposable;
  onResize(listener: (size: { cols: number; rows: number }) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: ThemeName = 'classic';

export function setTheme(mode: ThemeName): void {
  currentTheme = mode;
}

export function getTheme(): ThemeName {
  return currentTheme;
}

export function getCurrentPalette(): ThemePalette {
  return getPalette(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, and who put them there
 */
const alternateBufferState = new WeakMap<TypingTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 * @returns false if the terminal was already in the buffer
 */
export function enterAlternateBuffer(terminal: TypingTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 * @returns false if the terminal was not in the buffer
 */
export function exitAlternateBuffer(terminal: TypingTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: TypingTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}
