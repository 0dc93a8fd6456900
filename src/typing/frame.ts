/**
 * Frame drawing
 *
 * Mechanical projection of a DisplayModel onto ANSI escape sequences.
 * Layout: title, a "Words to Type" box, a "Speed (WPM)" box, a key hint.
 */

import type { ThemePalette } from '../themes';
import type { DisplayModel, TaggedChar } from './projector';
import { getVerticalAnchor } from './utils';

export interface FrameOptions {
  cols: number;
  rows: number;
  palette: ThemePalette;
}

// Minimum terminal size
export const MIN_COLS = 40;
export const MIN_ROWS = 12;

const MAX_BOX_WIDTH = 70;
const RESET = '\x1b[0m';
const HINT = 'ESC quit   CTRL+R new words';

type Word = TaggedChar[];

function lineLength(line: Word[]): number {
  return line.reduce((sum, word) => sum + word.length, 0) + Math.max(0, line.length - 1);
}

/**
 * Greedy word wrap. A word wider than `width` gets a line of its own.
 */
export function wrapWords(words: Word[], width: number): Word[][] {
  const lines: Word[][] = [];
  let line: Word[] = [];
  let length = 0;

  for (const word of words) {
    const needed = line.length === 0 ? word.length : length + 1 + word.length;
    if (line.length > 0 && needed > width) {
      lines.push(line);
      line = [word];
      length = word.length;
    } else {
      line.push(word);
      length = needed;
    }
  }
  if (line.length > 0) lines.push(line);
  return lines;
}

function colorLine(line: Word[], palette: ThemePalette): string {
  return line
    .map(word => word.map(({ char, tag }) => `${palette[tag]}${char}${RESET}`).join(''))
    .join(' ');
}

function boxTop(title: string, width: number): string {
  return `┌─ ${title} ${'─'.repeat(Math.max(0, width - title.length - 5))}┐`;
}

function boxBottom(width: number): string {
  return `└${'─'.repeat(width - 2)}┘`;
}

function tooSmall(cols: number, rows: number, palette: ThemePalette): string {
  const msg1 = 'Terminal too small!';
  const msg2 = `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);
  let output = '';
  output += `\x1b[${Math.max(1, centerY - 1)};${Math.max(1, centerX - Math.floor(msg1.length / 2))}H${palette.accent}${msg1}${RESET}`;
  output += `\x1b[${centerY + 1};${Math.max(1, centerX - Math.floor(msg2.length / 2))}H\x1b[2m${msg2}${RESET}`;
  return output;
}

export function renderFrame(model: DisplayModel, { cols, rows, palette }: FrameOptions): string {
  let output = '\x1b[2J\x1b[H';

  if (cols < MIN_COLS || rows < MIN_ROWS) {
    return output + tooSmall(cols, rows, palette);
  }

  const boxWidth = Math.min(MAX_BOX_WIDTH, cols - 4);
  const innerWidth = boxWidth - 4;
  const boxX = Math.floor((cols - boxWidth) / 2) + 1;
  const lines = wrapWords(model.words, innerWidth);

  // title, gap, text box, gap, wpm box, gap, hint
  const contentRows = 1 + 1 + (lines.length + 2) + 1 + 3 + 1 + 1;
  let y = getVerticalAnchor(rows, contentRows);

  const titleX = Math.max(1, Math.floor((cols - model.title.length) / 2) + 1);
  output += `\x1b[${y};${titleX}H\x1b[1m${palette.accent}${model.title}${RESET}`;
  y += 2;

  output += `\x1b[${y};${boxX}H${palette.accent}${boxTop('Words to Type', boxWidth)}${RESET}`;
  y++;
  for (const line of lines) {
    const pad = Math.max(0, Math.floor((innerWidth - lineLength(line)) / 2));
    output += `\x1b[${y};${boxX}H${palette.accent}│${RESET}`;
    output += `\x1b[${y};${boxX + 2 + pad}H${colorLine(line, palette)}`;
    output += `\x1b[${y};${boxX + boxWidth - 1}H${palette.accent}│${RESET}`;
    y++;
  }
  output += `\x1b[${y};${boxX}H${palette.accent}${boxBottom(boxWidth)}${RESET}`;
  y += 2;

  output += `\x1b[${y};${boxX}H${palette.accent}${boxTop('Speed (WPM)', boxWidth)}${RESET}`;
  y++;
  output += `\x1b[${y};${boxX}H${palette.accent}│${RESET}`;
  output += `\x1b[${y};${boxX + 2}H${palette.wpm}${model.wpmLabel}${RESET}`;
  output += `\x1b[${y};${boxX + boxWidth - 1}H${palette.accent}│${RESET}`;
  y++;
  output += `\x1b[${y};${boxX}H${palette.accent}${boxBottom(boxWidth)}${RESET}`;
  y += 2;

  const hintX = Math.max(1, Math.floor((cols - HINT.length) / 2) + 1);
  output += `\x1b[${y};${hintX}H\x1b[2m${palette.accent}${HINT}${RESET}`;

  return output;
}
