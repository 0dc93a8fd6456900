/**
 * Terminal color themes
 *
 * ANSI escape codes for every role the typing screen draws with.
 */

/**
 * Available theme identifiers
 */
export const THEME_NAMES = [
  'classic',
  'cyan',
  'amber',
  'green',
  'hotpink',
  'nord',
  'solarized',
  'highcontrast',
  'daylight',
] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

/**
 * ANSI codes for each role on screen
 */
export interface ThemePalette {
  /** Display name */
  name: string;
  /** Title, borders, labels */
  accent: string;
  /** Target text the input has matched */
  matched: string;
  /** Target text the input got wrong */
  mismatched: string;
  /** Target text not reached yet */
  pending: string;
  /** WPM readout */
  wpm: string;
}

export const themes: Record<ThemeName, ThemePalette> = {
  // Blue title, green text, yellow speed
  classic: {
    name: 'Classic',
    accent: '\x1b[94m',
    matched: '\x1b[32m',
    mismatched: '\x1b[31m',
    pending: '\x1b[92m',
    wpm: '\x1b[1;93m',
  },
  cyan: {
    name: 'Cyberpunk',
    accent: '\x1b[96m',
    matched: '\x1b[92m',
    mismatched: '\x1b[91m',
    pending: '\x1b[2;96m',
    wpm: '\x1b[1;96m',
  },
  amber: {
    name: 'Fallout',
    accent: '\x1b[93m',
    matched: '\x1b[1;93m',
    mismatched: '\x1b[91m',
    pending: '\x1b[2;93m',
    wpm: '\x1b[1;93m',
  },
  green: {
    name: 'Matrix',
    accent: '\x1b[92m',
    matched: '\x1b[1;92m',
    mismatched: '\x1b[91m',
    pending: '\x1b[2;32m',
    wpm: '\x1b[1;92m',
  },
  hotpink: {
    name: 'Synthwave',
    accent: '\x1b[95m',
    matched: '\x1b[96m',
    mismatched: '\x1b[91m',
    pending: '\x1b[2;95m',
    wpm: '\x1b[1;95m',
  },
  nord: {
    name: 'Nord',
    accent: '\x1b[38;5;110m',
    matched: '\x1b[38;5;108m',
    mismatched: '\x1b[38;5;167m',
    pending: '\x1b[38;5;60m',
    wpm: '\x1b[1;38;5;110m',
  },
  solarized: {
    name: 'Solarized',
    accent: '\x1b[36m',
    matched: '\x1b[38;5;64m',
    mismatched: '\x1b[38;5;160m',
    pending: '\x1b[38;5;246m',
    wpm: '\x1b[1;38;5;136m',
  },
  highcontrast: {
    name: 'High Contrast',
    accent: '\x1b[97m',
    matched: '\x1b[1;97m',
    mismatched: '\x1b[1;97;41m',
    pending: '\x1b[2;37m',
    wpm: '\x1b[1;93m',
  },
  // Dark text for light terminal backgrounds
  daylight: {
    name: 'Daylight',
    accent: '\x1b[34m',
    matched: '\x1b[32m',
    mismatched: '\x1b[31m',
    pending: '\x1b[90m',
    wpm: '\x1b[1;34m',
  },
};

export function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some(name => name === value);
}

export function getPalette(mode: ThemeName): ThemePalette {
  return themes[mode];
}
