/**
 * Node Terminal Adapter
 *
 * Maps raw stdin and stdout to the xterm.js-shaped surface the typing test
 * draws on, so it runs directly in any terminal emulator.
 */

import type { IDisposable } from '@xterm/xterm';
import type { KeyInput } from './typing/actions';
import type { TerminalKeyEvent, TypingTerminal } from './typing/utils';

type Size = { cols: number; rows: number };

export interface NodeInput {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
}

export interface NodeOutput {
  columns?: number;
  rows?: number;
  write(data: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
}

export interface NodeTerminalOptions {
  input?: NodeInput;
  output?: NodeOutput;
  /** Reading input failed or stdin closed; the terminal is already restored */
  onFatal: (error: Error) => void;
}

export interface NodeTerminal extends TypingTerminal {
  /** Leave raw mode and restore the screen. Safe to call more than once. */
  restore(): void;
}

const NAMED_SEQUENCES: Record<string, string> = {
  '\x1b[A': 'ArrowUp', '\x1bOA': 'ArrowUp',
  '\x1b[B': 'ArrowDown', '\x1bOB': 'ArrowDown',
  '\x1b[C': 'ArrowRight', '\x1bOC': 'ArrowRight',
  '\x1b[D': 'ArrowLeft', '\x1bOD': 'ArrowLeft',
  '\r': 'Enter', '\n': 'Enter',
  '\x1b': 'Escape',
  '\x7f': 'Backspace', '\b': 'Backspace',
  '\t': 'Tab',
};

/**
 * Parse one raw stdin key into DOM KeyboardEvent-style fields
 */
export function parseKey(data: string): KeyInput {
  const named = NAMED_SEQUENCES[data];
  if (named) return { key: named };

  // Control+letter arrives as 0x01-0x1a
  const code = data.length === 1 ? data.charCodeAt(0) : -1;
  if (code >= 1 && code <= 26) {
    return { key: String.fromCharCode(code + 96), ctrlKey: true };
  }

  // Alt+key arrives as ESC followed by the key
  if (data[0] === '\x1b' && Array.from(data).length === 2) {
    return { key: data.slice(1), altKey: true };
  }

  // Raw input only reveals Shift through uppercase letters
  if (/^[A-Z]$/.test(data)) {
    return { key: data, shiftKey: true };
  }

  return { key: data };
}

// CSI and SS3 sequences, ESC+key, lone ESC, or a single code point
const KEY_TOKEN = /\x1b\[[0-9;?]*[\x40-\x7e]|\x1bO[\x40-\x7e]|\x1b[^\x1b]?|[\s\S]/gu;

/**
 * Split one stdin chunk into keys. Escape sequences stay whole wherever they
 * appear; anything else (fast typing, paste) is one key per character.
 */
export function parseKeys(data: string): KeyInput[] {
  return (data.match(KEY_TOKEN) ?? []).map(parseKey);
}

function addListener<T>(listeners: ((value: T) => void)[], callback: (value: T) => void): IDisposable {
  listeners.push(callback);
  return {
    dispose: () => {
      const idx = listeners.indexOf(callback);
      if (idx !== -1) listeners.splice(idx, 1);
    },
  };
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(options: NodeTerminalOptions): NodeTerminal {
  const input: NodeInput = options.input ?? process.stdin;
  const output: NodeOutput = options.output ?? process.stdout;
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];
  const resizeListeners: ((size: Size) => void)[] = [];
  let restored = false;

  if (input.isTTY) {
    input.setRawMode?.(true);
  }
  input.setEncoding('utf8');
  input.resume();

  function restore() {
    if (restored) return;
    restored = true;
    if (input.isTTY) {
      input.setRawMode?.(false);
    }
    input.pause();
    output.write('\x1b[?1049l');
    output.write('\x1b[?25h');
    output.write('\x1b[0m');
  }

  function fail(error: Error) {
    restore();
    options.onFatal(error);
  }

  input.on('data', (data: string) => {
    for (const domEvent of parseKeys(data)) {
      for (const listener of [...keyListeners]) {
        listener({ key: domEvent.key, domEvent });
      }
    }
  });
  input.on('error', fail);
  input.on('end', () => fail(new Error('Input stream closed')));

  output.on('resize', () => {
    const size = { cols: output.columns || 80, rows: output.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  });

  return {
    write: (data: string) => {
      output.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return output.columns || 80; },
    get rows() { return output.rows || 24; },
    onKey: callback => addListener(keyListeners, callback),
    onResize: callback => addListener(resizeListeners, callback),
    restore,
  };
}
