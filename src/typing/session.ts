/**
 * Typing session state
 *
 * Pure state transitions for a single typing test: the target words, what has
 * been typed, when typing started, and the WPM samples taken so far.
 * The driver owns one Session and threads it through every loop iteration.
 */

import { defaultRandom, sampleWithoutReplacement, type RandomSource } from './random';
import { DEFAULT_CORPUS, SAMPLE_SIZE } from './words';

// ============================================================================
// Types
// ============================================================================

/**
 * Monotonic time source, in milliseconds
 */
export interface Clock {
  now(): number;
}

export interface SessionEnv {
  random: RandomSource;
  clock: Clock;
  corpus: readonly string[];
  sampleSize: number;
}

export interface Session {
  readonly env: SessionEnv;
  targetWords: readonly string[];
  input: string;
  /** Clock reading of the first typed character; null until then */
  startTime: number | null;
  wpmHistory: number[];
}

// ============================================================================
// Constants
// ============================================================================

/** A "word" in typing tests is standardized as 5 characters */
export const CHARS_PER_WORD = 5;

export const systemClock: Clock = {
  now: () => performance.now(),
};

// ============================================================================
// Lifecycle
// ============================================================================

function sampleWords(env: SessionEnv): string[] {
  if (env.corpus.length === 0) {
    throw new RangeError('Word corpus is empty');
  }
  return sampleWithoutReplacement(env.corpus, env.sampleSize, env.random);
}

/**
 * Create a fresh session with a new word sample
 */
export function initializeSession(overrides: Partial<SessionEnv> = {}): Session {
  const env: SessionEnv = {
    random: overrides.random ?? defaultRandom,
    clock: overrides.clock ?? systemClock,
    corpus: overrides.corpus ?? DEFAULT_CORPUS,
    sampleSize: overrides.sampleSize ?? SAMPLE_SIZE,
  };
  return {
    env,
    targetWords: sampleWords(env),
    input: '',
    startTime: null,
    wpmHistory: [],
  };
}

/**
 * Start over: new words, empty input, timer and history cleared
 */
export function applyReset(session: Session): void {
  session.targetWords = sampleWords(session.env);
  session.input = '';
  session.startTime = null;
  session.wpmHistory = [];
}

// ============================================================================
// Typing
// ============================================================================

/**
 * Append a typed character. Mismatches are recorded, never rejected.
 * The first character of a session starts the timer.
 */
export function applyCharacter(session: Session, char: string): void {
  if (session.startTime === null) {
    session.startTime = session.env.clock.now();
  }
  session.input += char;
}

/**
 * Whole seconds since the first keystroke, 0 before it
 */
export function elapsedSeconds(session: Session): number {
  if (session.startTime === null) return 0;
  return Math.floor((session.env.clock.now() - session.startTime) / 1000);
}

export function typedLength(session: Session): number {
  return Array.from(session.input).length;
}

/**
 * WPM for `chars` characters over `seconds` whole seconds
 */
export function computeWpm(chars: number, seconds: number): number {
  if (seconds <= 0) return 0;
  return Math.trunc((chars / CHARS_PER_WORD) * (60 / seconds));
}

/**
 * Take a WPM sample. Called once per loop iteration; appends whenever at
 * least one whole second has passed, so the same value may repeat.
 */
export function tick(session: Session): void {
  const seconds = elapsedSeconds(session);
  if (seconds < 1) return;
  session.wpmHistory.push(computeWpm(typedLength(session), seconds));
}

/**
 * Most recent WPM sample, or 0
 */
export function currentWpm(session: Session): number {
  const history = session.wpmHistory;
  return history.length > 0 ? history[history.length - 1] : 0;
}
