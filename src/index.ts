/**
 * teaty
 *
 * Typing speed test for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runTypingTest, setTheme } from 'teaty';
 *   setTheme('cyan');
 *   const controller = runTypingTest(terminal);
 *
 * CLI usage:
 *   npx teaty
 */

export {
  runTypingTest,
  START_DELAY_MS,
  type SessionView,
  type TypingSummary,
  type TypingTestController,
  type TypingTestOptions,
} from './typing';

// Session state
export {
  initializeSession,
  applyCharacter,
  applyReset,
  tick,
  currentWpm,
  elapsedSeconds,
  computeWpm,
  systemClock,
  CHARS_PER_WORD,
  type Clock,
  type Session,
  type SessionEnv,
} from './typing/session';

// Input actions
export { translateKey, applyAction, type InputAction, type KeyInput } from './typing/actions';

// Display
export { projectSession, TITLE, type CharTag, type DisplayModel, type TaggedChar } from './typing/projector';
export { renderFrame, wrapWords, MIN_COLS, MIN_ROWS, type FrameOptions } from './typing/frame';

// Random sources and words
export { createRng, defaultRandom, sampleWithoutReplacement, type RandomSource } from './typing/random';
export { DEFAULT_CORPUS, SAMPLE_SIZE } from './typing/words';

// Theme and terminal utilities
export {
  setTheme,
  getTheme,
  getCurrentPalette,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  getVerticalAnchor,
  type TypingTerminal,
  type TerminalKeyEvent,
} from './typing/utils';
export { themes, THEME_NAMES, isThemeName, getPalette, type ThemeName, type ThemePalette } from './themes';
