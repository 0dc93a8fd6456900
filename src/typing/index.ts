/**
 * Teaty Typing Speed Test
 *
 * Ten words, live per-character feedback, running WPM.
 * One loop iteration per terminal event: translate, apply, tick, draw.
 */

import { IGNORED, applyAction, translateKey, type InputAction } from './actions';
import { renderFrame } from './frame';
import { projectSession } from './projector';
import { currentWpm, initializeSession, tick, typedLength, type Session, type SessionEnv } from './session';
import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentPalette,
  type TypingTerminal,
} from './utils';

export interface TypingSummary {
  wpm: number;
  characters: number;
  wpmHistory: readonly number[];
}

export interface TypingTestOptions {
  /** Overrides for the random source, clock, corpus or sample size */
  env?: Partial<SessionEnv>;
  /** Called once after the user quits */
  onQuit?: (summary: TypingSummary) => void;
}

/**
 * Read-only view of a session. The driver keeps mutating the underlying
 * value, so reads always reflect the latest iteration.
 */
export type SessionView = Readonly<Omit<Session, 'wpmHistory'>> & {
  readonly wpmHistory: readonly number[];
};

/**
 * Typing Test Controller
 */
export interface TypingTestController {
  stop: () => void;
  readonly isRunning: boolean;
  /** Live view of the current session, null until the test has started */
  readonly session: SessionView | null;
}

// Delay before taking over the screen
export const START_DELAY_MS = 50;

export function runTypingTest(terminal: TypingTerminal, options: TypingTestOptions = {}): TypingTestController {
  let running = true;
  let session: Session | null = null;
  const disposers: (() => void)[] = [];

  function draw(current: Session) {
    terminal.write(renderFrame(projectSession(current), {
      cols: terminal.cols,
      rows: terminal.rows,
      palette: getCurrentPalette(),
    }));
  }

  function shutdown() {
    running = false;
    for (const dispose of disposers.splice(0)) dispose();
    if (session) exitAlternateBuffer(terminal, 'typing test ended');
  }

  function step(current: Session, action: InputAction) {
    if (!applyAction(current, action)) {
      shutdown();
      options.onQuit?.({
        wpm: currentWpm(current),
        characters: typedLength(current),
        wpmHistory: current.wpmHistory,
      });
      return;
    }
    tick(current);
    draw(current);
  }

  const startTimer = setTimeout(() => {
    if (!running) return;

    const current = initializeSession(options.env);
    session = current;
    enterAlternateBuffer(terminal, 'typing test');
    draw(current);

    const keyListener = terminal.onKey(({ domEvent }) => {
      if (!running) return;
      domEvent.preventDefault?.();
      domEvent.stopPropagation?.();
      step(current, translateKey(domEvent));
    });
    const resizeListener = terminal.onResize(() => {
      if (!running) return;
      step(current, IGNORED);
    });
    disposers.push(() => keyListener.dispose(), () => resizeListener.dispose());
  }, START_DELAY_MS);

  const controller: TypingTestController = {
    stop: () => {
      if (!running) return;
      clearTimeout(startTimer);
      shutdown();
    },
    get isRunning() { return running; },
    get session() { return session; },
  };

  return controller;
}
