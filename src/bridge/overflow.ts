/**
 * Fits agent output into length-limited chat messages.
 *
 * - "split": as many chunks as needed. Cuts after the last paragraph break
 *   in the second half of the window, else after the last line break, and
 *   only cuts mid-line when the line alone exceeds the limit. Chunks are
 *   plain slices: joining them gives back the original text.
 * - "trim": one chunk, cut and marked with TRUNCATION_MARKER. Text past
 *   the limit is dropped.
 *
 * Empty text yields no chunks under either policy.
 */

export type OverflowPolicy = "split" | "trim";

export const TRUNCATION_MARKER = "\n… _(truncated)_";

const MIN_LIMIT = TRUNCATION_MARKER.length + 2;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Never cut between the two halves of a surrogate pair. */
function safeCut(text: string, index: number): number {
  if (index > 1 && isHighSurrogate(text.charCodeAt(index - 1))) return index - 1;
  return index;
}

function splitPoint(text: string, limit: number): number {
  const window = text.slice(0, limit);

  const paragraph = window.lastIndexOf("\n\n");
  if (paragraph >= 0 && paragraph + 2 >= limit / 2) return paragraph + 2;

  const line = window.lastIndexOf("\n");
  if (line >= 0) return line + 1;

  return safeCut(text, limit);
}

export function splitMessage(text: string, limit: number): string[] {
  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > 0) {
    if (remaining.length <= limit) {
      chunks.push(remaining);
      break;
    }
    const cut = splitPoint(remaining, limit);
    chunks.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut);
  }
  return chunks;
}

export function trimMessage(text: string, limit: number): string[] {
  if (text.length === 0) return [];
  if (text.length <= limit) return [text];
  const cut = safeCut(text, limit - TRUNCATION_MARKER.length);
  return [text.slice(0, cut) + TRUNCATION_MARKER];
}

export function formatOverflow(text: string, policy: OverflowPolicy, limit: number): string[] {
  if (!Number.isInteger(limit) || limit < MIN_LIMIT) {
    throw new RangeError(`Message limit must be an integer of at least ${MIN_LIMIT}, got ${limit}`);
  }
  return policy === "trim" ? trimMessage(text, limit) : splitMessage(text, limit);
}

/** Last `limit` characters, prefixed with an ellipsis when cut. */
export function tail(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const start = text.length - limit + 1;
  const safeStart = start < text.length && isHighSurrogate(text.charCodeAt(start - 1)) ? start + 1 : start;
  return "…" + text.slice(safeStart);
}
