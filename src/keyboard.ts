/**
 * Raw stdin → InputSnapshot
 *
 * A raw-mode terminal only reports key presses, never releases. Each press
 * holds its key down until no repeat has arrived for `releaseMs`, which
 * is long enough to bridge the terminal's auto-repeat.
 */

import type { InputSnapshot, LogicalKey } from './engine';

export const DEFAULT_RELEASE_MS = 120;

export interface KeySource {
  on(event: 'data', listener: (data: string) => void): unknown;
  off(event: 'data', listener: (data: string) => void): unknown;
}

export interface KeyboardOptions {
  releaseMs?: number;
  /** Ctrl+C; raw mode swallows the signal */
  onInterrupt?: () => void;
}

/** How long a bare ESC waits for the rest of an escape sequence */
export const ESCAPE_TIMEOUT_MS = 30;

export interface SplitKeys {
  keys: string[];
  /** An escape sequence cut off at the end of the chunk */
  rest: string;
}

/**
 * Index just past the escape sequence starting at `start`, or -1 if the
 * data ends before the sequence does
 */
function escapeEnd(data: string, start: number): number {
  if (start + 1 >= data.length) return -1;
  const introducer = data[start + 1];
  if (introducer === 'O') return start + 3 <= data.length ? start + 3 : -1;
  // Alt+key
  if (introducer !== '[') return start + 2;

  // CSI: parameter and intermediate bytes up to a final byte in @..~
  for (let i = start + 2; i < data.length; i++) {
    const code = data.charCodeAt(i);
    if (code >= 0x40 && code <= 0x7e) return i + 1;
  }
  return -1;
}

/**
 * Split a chunk into single keys. Key repeat can deliver several in one read.
 */
export function splitKeys(data: string): SplitKeys {
  const keys: string[] = [];
  let i = 0;
  while (i < data.length) {
    if (data[i] !== '\x1b') {
      keys.push(data[i]);
      i++;
      continue;
    }
    const end = escapeEnd(data, i);
    if (end === -1) return { keys, rest: data.slice(i) };
    keys.push(data.slice(i, end));
    i = end;
  }
  return { keys, rest: '' };
}

/**
 * Map one key sequence to a logical key, or null if the engine does not use it
 */
export function parseKey(data: string): LogicalKey | null {
  if (data === '\x1b[A' || data === '\x1bOA') return 'up';
  if (data === '\x1b[B' || data === '\x1bOB') return 'down';
  if (data === '\x1b[C' || data === '\x1bOC') return 'right';
  if (data === '\x1b[D' || data === '\x1bOD') return 'left';
  if (data === ' ') return 'space';
  if (data === '\x1b') return 'q';

  switch (data.toLowerCase()) {
    case 'w': return 'w';
    case 'a': return 'a';
    case 's': return 's';
    case 'd': return 'd';
    case 'q': return 'q';
    default: return null;
  }
}

/**
 * @returns detach, which also releases every key still held
 */
export function attachKeyboard(source: KeySource, snapshot: InputSnapshot, options: KeyboardOptions = {}): () => void {
  const releaseMs = options.releaseMs ?? DEFAULT_RELEASE_MS;
  const heldKeys = new Map<LogicalKey, ReturnType<typeof setTimeout>>();

  let pending = '';
  let escapeTimer: ReturnType<typeof setTimeout> | undefined;

  const handleKey = (token: string) => {
    if (token === '\x03') {
      options.onInterrupt?.();
      return;
    }

    const key = parseKey(token);
    if (!key) return;

    snapshot.press(key);
    const held = heldKeys.get(key);
    if (held !== undefined) clearTimeout(held);
    heldKeys.set(key, setTimeout(() => {
      snapshot.release(key);
      heldKeys.delete(key);
    }, releaseMs));
  };

  const onData = (data: string) => {
    clearTimeout(escapeTimer);
    escapeTimer = undefined;

    const { keys, rest } = splitKeys(pending + data);
    pending = rest;
    keys.forEach(handleKey);

    if (pending !== '') {
      escapeTimer = setTimeout(() => {
        escapeTimer = undefined;
        // Nothing followed: a bare ESC is the Escape key, a partial sequence is dropped
        if (pending === '\x1b') handleKey(pending);
        pending = '';
      }, ESCAPE_TIMEOUT_MS);
    }
  };

  source.on('data', onData);

  return () => {
    source.off('data', onData);
    clearTimeout(escapeTimer);
    pending = '';
    for (const [key, timer] of heldKeys) {
      clearTimeout(timer);
      snapshot.release(key);
    }
    heldKeys.clear();
  };
}
