/**
 * Render projection
 *
 * Turns a Session into what the screen should show, without drawing anything.
 */

import { currentWpm, type Session } from './session';

export type CharTag = 'matched' | 'mismatched' | 'pending';

export interface TaggedChar {
  char: string;
  tag: CharTag;
}

export interface DisplayModel {
  title: string;
  /** One entry per target word; joined by single spaces when drawn */
  words: TaggedChar[][];
  wpm: number;
  wpmLabel: string;
}

export const TITLE = 'Teaty Typing Speed Test';

function tagFor(expected: string, typed: string | undefined): CharTag {
  if (typed === undefined) return 'pending';
  return typed === expected ? 'matched' : 'mismatched';
}

/**
 * Input position compared against character `j` of word `i`.
 * Every word is assumed to be followed by exactly one separator, using that
 * word's own length as the stride.
 */
export function inputIndexFor(wordIndex: number, wordLength: number, charIndex: number): number {
  return wordIndex * (wordLength + 1) + charIndex;
}

export function projectSession(session: Session): DisplayModel {
  const typed = Array.from(session.input);

  const words = session.targetWords.map((word, i) => {
    const chars = Array.from(word);
    return chars.map((char, j) => ({
      char,
      tag: tagFor(char, typed[inputIndexFor(i, chars.length, j)]),
    }));
  });

  const wpm = currentWpm(session);
  return { title: TITLE, words, wpm, wpmLabel: `WPM: ${wpm}` };
}
