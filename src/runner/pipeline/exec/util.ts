/* src/runner/pipeline/exec/util.ts
 * Helpers for child output handling.
 */

/** Default cap (characters) on the retained output tail. */
export const OUTPUT_TAIL_LIMIT = 4000;

/**
 * Append a chunk to a bounded tail buffer. When over the limit, drop from the
 * front so the most recent output is kept.
 */
export const appendTail = (
  tail: string,
  chunk: string,
  limit = OUTPUT_TAIL_LIMIT,
): string => {
  const next = tail + chunk;
  return next.length > limit ? next.slice(next.length - limit) : next;
};

/** Last `n` non-empty lines of a block of text. */
export const lastLines = (text: string, n: number): string[] =>
  text
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0)
    .slice(-n);
