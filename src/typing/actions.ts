/**
 * Input actions
 *
 * Translates terminal key events into the four things a keystroke can mean
 * to a session, so session code never sees terminal vocabulary.
 */

import { applyCharacter, applyReset, type Session } from './session';

export type InputAction =
  | { type: 'character'; char: string }
  | { type: 'quit' }
  | { type: 'reset' }
  | { type: 'ignored' };

/**
 * The subset of KeyboardEvent the translator reads
 */
export interface KeyInput {
  key: string;
  ctrlKey?: boolean;
  altKey?: boolean;
  metaKey?: boolean;
  shiftKey?: boolean;
}

export const IGNORED: InputAction = { type: 'ignored' };

function isPrintable(key: string): boolean {
  // Named keys ('Enter', 'ArrowUp', ...) are longer than one code point
  return Array.from(key).length === 1 && !/\p{Cc}/u.test(key);
}

export function translateKey(event: KeyInput): InputAction {
  const { key } = event;

  if (key === 'Escape') return { type: 'quit' };

  if (event.ctrlKey && !event.altKey && !event.metaKey) {
    if (key === 'c' || key === 'C') return { type: 'quit' };
    if (key === 'r') return { type: 'reset' };
    return IGNORED;
  }

  // Only an unmodified key types; Shift counts as a modifier
  const modified = event.ctrlKey || event.altKey || event.metaKey || event.shiftKey;
  if (!modified && isPrintable(key)) {
    return { type: 'character', char: key };
  }

  return IGNORED;
}

/**
 * Apply an action to the session.
 * @returns false when the action ends the loop
 */
export function applyAction(session: Session, action: InputAction): boolean {
  switch (action.type) {
    case 'character':
      applyCharacter(session, action.char);
      return true;
    case 'reset':
      applyReset(session);
      return true;
    case 'quit':
      return false;
    case 'ignored':
      return true;
  }
}
