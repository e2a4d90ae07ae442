/**
 * Source Text Helpers
 *
 * Comment/string masking, line lookup and bracket matching for the
 * pattern-based extractors.
 *
 * @module parser/source-text
 */

// ============================================================================
// MASKING
// ============================================================================

export interface MaskOptions {
  /** `//` and `/* *\/` comments */
  cStyleComments?: boolean;
  /** `#` comments */
  hashComments?: boolean;
  /** `"""` / `'''` strings */
  tripleQuotes?: boolean;
  /** `'` delimits strings or char literals */
  singleQuotes?: boolean;
}

/**
 * Replace comment and string-literal contents with spaces. Offsets and
 * line breaks are preserved, so positions in the masked text are
 * positions in the source. String delimiters are kept.
 */
export function maskSource(content: string, options: MaskOptions): string {
  const out = content.split('');
  const n = content.length;
  let i = 0;

  const blank = (from: number, to: number): void => {
    for (let k = from; k < to && k < n; k++) {
      if (out[k] !== '\n') out[k] = ' ';
    }
  };

  while (i < n) {
    const ch = content[i];
    const next = content[i + 1];

    if (options.cStyleComments && ch === '/' && next === '/') {
      const end = content.indexOf('\n', i);
      const stop = end === -1 ? n : end;
      blank(i, stop);
      i = stop;
      continue;
    }

    if (options.cStyleComments && ch === '/' && next === '*') {
      const end = content.indexOf('*/', i + 2);
      const stop = end === -1 ? n : end + 2;
      blank(i, stop);
      i = stop;
      continue;
    }

    if (options.hashComments && ch === '#') {
      const end = content.indexOf('\n', i);
      const stop = end === -1 ? n : end;
      blank(i, stop);
      i = stop;
      continue;
    }

    if (ch === '"' || (ch === "'" && options.singleQuotes)) {
      const triple = ch.repeat(3);
      if (options.tripleQuotes && content.startsWith(triple, i)) {
        const end = content.indexOf(triple, i + 3);
        const stop = end === -1 ? n : end;
        blank(i + 3, stop);
        i = stop + 3;
        continue;
      }

      let j = i + 1;
      while (j < n && content[j] !== ch && content[j] !== '\n') {
        if (content[j] === '\\') j++;
        j++;
      }
      blank(i + 1, j);
      i = j + 1;
      continue;
    }

    i++;
  }

  return out.join('');
}

// ============================================================================
// LINES
// ============================================================================

/**
 * Offset → 1-indexed line lookup
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(content: string) {
    for (let i = 0; i < content.length; i++) {
      if (content.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.starts.length;
  }

  lineOf(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      const start = this.starts[mid] ?? 0;
      if (start <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }
}

// ============================================================================
// BRACKETS
// ============================================================================

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Offset just past the bracket that closes the one at `openOffset`, or
 * the text length when it is never closed
 */
export function matchBracket(masked: string, openOffset: number): number {
  const open = masked[openOffset];
  const close = open ? OPENERS[open] : undefined;
  if (!open || !close) return openOffset + 1;

  let depth = 0;
  for (let i = openOffset; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return masked.length;
}

/**
 * Count top-level arguments of the call whose `(` is at `openOffset`
 */
export function countArguments(masked: string, openOffset: number): number {
  const end = matchBracket(masked, openOffset);
  const inner = masked.substring(openOffset + 1, end - 1);
  if (!inner.trim()) return 0;

  let depth = 0;
  let count = 1;
  for (const ch of inner) {
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
    else if (ch === ',' && depth === 0) count++;
  }
  // trailing comma
  if (inner.trimEnd().endsWith(',')) count--;
  return count;
}
