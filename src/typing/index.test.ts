import { describe, it, expect, expectTypeOf, vi, beforeEach, afterEach } from 'vitest';
import { runTypingTest, START_DELAY_MS, type SessionView, type TypingSummary, type TypingTestController } from './index';
import type { KeyInput } from './actions';
import { createManualClock, firstPick } from './testing';
import { isInAlternateBuffer, type TerminalKeyEvent, type TypingTerminal } from './utils';

function createFakeTerminal(cols = 80, rows = 24) {
  const writes: string[] = [];
  const keyListeners = new Set<(event: TerminalKeyEvent) => void>();
  const resizeListeners = new Set<(size: { cols: number; rows: number }) => void>();

  const terminal: TypingTerminal = {
    write: data => { writes.push(data); },
    cols,
    rows,
    onKey: listener => {
      keyListeners.add(listener);
      return { dispose: () => { keyListeners.delete(listener); } };
    },
    onResize: listener => {
      resizeListeners.add(listener);
      return { dispose: () => { resizeListeners.delete(listener); } };
    },
  };

  return {
    terminal,
    writes,
    press(domEvent: KeyInput) {
      for (const listener of [...keyListeners]) listener({ key: domEvent.key, domEvent });
    },
    type(text: string) {
      for (const key of text) this.press({ key });
    },
    resize() {
      for (const listener of [...resizeListeners]) listener({ cols, rows });
    },
    listenerCount: () => keyListeners.size + resizeListeners.size,
  };
}

describe('runTypingTest', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('takes over the screen after the start delay', () => {
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal);
    expect(controller.session).toBeNull();
    expect(fake.writes).toEqual([]);

    vi.advanceTimersByTime(START_DELAY_MS);

    expect(controller.session?.targetWords).toHaveLength(10);
    expect(fake.writes[0]).toBe('\x1b[?1049h');
    expect(isInAlternateBuffer(fake.terminal)).toBe(true);
    expect(fake.writes.at(-1)).toContain('WPM: 0');
  });

  it('records typed characters and redraws each time', () => {
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal, { env: { random: firstPick } });
    vi.advanceTimersByTime(START_DELAY_MS);
    const drawsBefore = fake.writes.length;

    fake.type('hey');

    expect(controller.session?.input).toBe('hey');
    expect(fake.writes.length).toBe(drawsBefore + 3);
  });

  it('exposes the session as a live read-only view', () => {
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal);
    vi.advanceTimersByTime(START_DELAY_MS);
    const view = controller.session;

    fake.type('ok');

    expect(controller.session).toBe(view);
    expect(view?.input).toBe('ok');
    expectTypeOf<TypingTestController['session']>().toEqualTypeOf<SessionView | null>();
    expectTypeOf<SessionView['wpmHistory']>().toEqualTypeOf<readonly number[]>();
    expectTypeOf<SessionView['targetWords']>().toEqualTypeOf<readonly string[]>();
  });

  it('ignores named keys without changing state', () => {
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal);
    vi.advanceTimersByTime(START_DELAY_MS);

    fake.press({ key: 'Enter' });
    fake.press({ key: 'Backspace' });

    expect(controller.session?.input).toBe('');
    expect(controller.session?.startTime).toBeNull();
  });

  it('samples WPM on every iteration, including resizes', () => {
    const clock = createManualClock();
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal, { env: { clock } });
    vi.advanceTimersByTime(START_DELAY_MS);

    fake.type('hello');
    expect(controller.session?.wpmHistory).toEqual([]);

    clock.advance(2000);
    fake.resize();
    expect(controller.session?.wpmHistory).toEqual([30]);
    expect(fake.writes.at(-1)).toContain('WPM: 30');

    fake.resize();
    expect(controller.session?.wpmHistory).toEqual([30, 30]);
  });

  it('starts over on Control+R', () => {
    const clock = createManualClock();
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal, { env: { clock } });
    vi.advanceTimersByTime(START_DELAY_MS);

    fake.type('abc');
    clock.advance(3000);
    fake.type('d');
    fake.press({ key: 'r', ctrlKey: true });

    expect(controller.session?.input).toBe('');
    expect(controller.session?.startTime).toBeNull();
    expect(controller.session?.wpmHistory).toEqual([]);
    expect(controller.isRunning).toBe(true);
  });

  it('quits on Escape and reports a summary', () => {
    const clock = createManualClock();
    const fake = createFakeTerminal();
    const onQuit = vi.fn<(summary: TypingSummary) => void>();
    const controller = runTypingTest(fake.terminal, { env: { clock }, onQuit });
    vi.advanceTimersByTime(START_DELAY_MS);

    fake.type('a'.repeat(25));
    clock.advance(10_000);
    fake.resize();
    fake.press({ key: 'Escape' });

    expect(controller.isRunning).toBe(false);
    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(onQuit).toHaveBeenCalledWith({ wpm: 30, characters: 25, wpmHistory: [30] });
    expect(fake.listenerCount()).toBe(0);
    expect(isInAlternateBuffer(fake.terminal)).toBe(false);
  });

  it('quits on Control+C', () => {
    const fake = createFakeTerminal();
    const onQuit = vi.fn<(summary: TypingSummary) => void>();
    const controller = runTypingTest(fake.terminal, { onQuit });
    vi.advanceTimersByTime(START_DELAY_MS);

    fake.press({ key: 'c', ctrlKey: true });

    expect(controller.isRunning).toBe(false);
    expect(onQuit).toHaveBeenCalledWith({ wpm: 0, characters: 0, wpmHistory: [] });
  });

  it('never starts when stopped during the start delay', () => {
    const fake = createFakeTerminal();
    const controller = runTypingTest(fake.terminal);
    controller.stop();
    vi.advanceTimersByTime(START_DELAY_MS * 2);

    expect(controller.isRunning).toBe(false);
    expect(controller.session).toBeNull();
    expect(fake.writes).toEqual([]);
  });

  it('releases the terminal on stop()', () => {
    const fake = createFakeTerminal();
    const onQuit = vi.fn<(summary: TypingSummary) => void>();
    const controller = runTypingTest(fake.terminal, { onQuit });
    vi.advanceTimersByTime(START_DELAY_MS);

    controller.stop();
    fake.type('x');

    expect(fake.listenerCount()).toBe(0);
    expect(fake.writes.at(-1)).toBe('\x1b[?25h');
    expect(onQuit).not.toHaveBeenCalled();
  });
});
