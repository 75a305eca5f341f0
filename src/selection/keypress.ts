/**
 * Keypress Decoding
 *
 * Maps raw terminal input chunks to the keys the selection list reacts to.
 * Ink's `useInput` folds Home/End into an empty input, so the list decodes
 * the raw chunk itself.
 */

export type NamedKey = 'up' | 'down' | 'home' | 'end' | 'enter' | 'escape' | 'ctrl-c';

export type Keypress = { type: 'named'; name: NamedKey } | { type: 'char'; char: string } | { type: 'unknown' };

const ESCAPE_SEQUENCES: Record<string, NamedKey> = {
  '\x1b[A': 'up',
  '\x1bOA': 'up',
  '\x1b[B': 'down',
  '\x1bOB': 'down',
  '\x1b[H': 'home',
  '\x1bOH': 'home',
  '\x1b[1~': 'home',
  '\x1b[7~': 'home',
  '\x1b[F': 'end',
  '\x1bOF': 'end',
  '\x1b[4~': 'end',
  '\x1b[8~': 'end',
};

// One escape sequence, a CRLF pair, or a single code point
const KEY_TOKEN_PATTERN = /\x1b\[[0-9;]*[~A-Za-z]|\x1bO[A-Za-z]|\x1b|\r\n|[\s\S]/gu;

/**
 * Split a chunk holding several keys (a held arrow key, pasted text) into single keys
 */
export function splitKeypresses(chunk: string): string[] {
  return chunk.match(KEY_TOKEN_PATTERN) ?? [];
}

export function decodeKeypresses(chunk: string): Keypress[] {
  return splitKeypresses(chunk).map(decodeKeypress);
}

export function decodeKeypress(chunk: string): Keypress {
  const named = ESCAPE_SEQUENCES[chunk];
  if (named) {
    return { type: 'named', name: named };
  }

  switch (chunk) {
    case '\r':
    case '\n':
    case '\r\n':
      return { type: 'named', name: 'enter' };
    case '\x1b':
      return { type: 'named', name: 'escape' };
    case '\x03':
      return { type: 'named', name: 'ctrl-c' };
  }

  // Single printable character (code points, so astral characters count as one)
  const chars = [...chunk];
  if (chars.length === 1 && chunk >= ' ' && chunk !== '\x7f') {
    return { type: 'char', char: chunk };
  }

  return { type: 'unknown' };
}
