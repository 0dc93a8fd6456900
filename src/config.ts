/**
 * Command-line configuration
 */

import { THEME_NAMES, isThemeName, type ThemeName } from './themes';

export interface CliConfig {
  theme: ThemeName;
  /** Fixed seed for the word sample; random when absent */
  seed?: number;
}

export type CliCommand =
  | { kind: 'run'; config: CliConfig }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export const DEFAULT_THEME: ThemeName = 'classic';

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const config: CliConfig = { theme: DEFAULT_THEME };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--version':
      case '-v':
        return { kind: 'version' };
      case '--theme': {
        const value = argv[++i];
        if (value === undefined) return { kind: 'error', message: '--theme needs a value' };
        if (!isThemeName(value)) {
          return { kind: 'error', message: `Unknown theme: ${value} (available: ${THEME_NAMES.join(', ')})` };
        }
        config.theme = value;
        break;
      }
      case '--seed': {
        const value = argv[++i];
        if (value === undefined || !/^\d+$/.test(value)) {
          return { kind: 'error', message: '--seed needs a non-negative integer' };
        }
        config.seed = Number(value);
        break;
      }
      default:
        return { kind: 'error', message: `Unknown argument: ${arg}` };
    }
  }

  return { kind: 'run', config };
}

export function helpText(): string {
  return `
  teaty — Terminal typing speed test

  Usage:
    teaty                        Start a test
    teaty --theme <theme>        Set color theme
    teaty --seed <n>             Use a fixed word sample
    teaty --version              Print version
    teaty --help                 Show this help

  Themes:
    ${THEME_NAMES.join(', ')}

  Controls:
    Type                 Match the words
    CTRL+R               New words, reset timer
    ESC / CTRL+C         Quit
`;
}
