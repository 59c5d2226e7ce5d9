export const TRUNCATION_INDICATOR = '\n…(truncated)';
/** Marks progress lines dropped from the front of a trimmed message. */
export const OMISSION_INDICATOR = '…\n';

/** Break points, most preferred first. `offset` is where the cut lands relative to the match. */
const BOUNDARIES: ReadonlyArray<{ separator: string; offset: number }> = [
  { separator: '\n\n', offset: 2 },
  // Keep the fence opener with the block it opens.
  { separator: '\n```', offset: 1 },
  { separator: '\n', offset: 1 },
  { separator: ' ', offset: 1 }
];

/** Cuts `text` to at most `limit` characters, ending with {@link TRUNCATION_INDICATOR} when anything was dropped. */
export function trimToLimit(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return text.slice(0, Math.max(0, limit - TRUNCATION_INDICATOR.length)) + TRUNCATION_INDICATOR;
}

/**
 * Keeps the newest whole lines of `text` that fit in `limit`, behind
 * {@link OMISSION_INDICATOR} when anything was dropped. A last line longer
 * than the budget is cut from its front.
 */
export function keepTail(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  const budget = limit - OMISSION_INDICATOR.length;
  if (budget <= 0) {
    return '';
  }
  const from = text.length - budget;
  const newline = text.indexOf('\n', from - 1);
  const cut = newline >= 0 && newline + 1 < text.length ? newline + 1 : from;
  return OMISSION_INDICATOR + text.slice(cut);
}

/**
 * Fits `progress` followed by `closing` into `limit`. The closing section is
 * always kept (cut at its end only if it alone is too long); progress gives up
 * its oldest lines first.
 */
export function trimWithClosing(progress: string, closing: string, limit: number): string {
  if (progress.length + closing.length <= limit) {
    return progress + closing;
  }
  if (!closing) {
    return keepTail(progress, limit);
  }
  const kept = trimToLimit(closing, limit);
  const room = limit - kept.length;
  const recent = room > OMISSION_INDICATOR.length ? keepTail(progress, room) : '';
  return recent ? recent + kept : kept.replace(/^\n+/, '');
}

/**
 * Index at which to cut `text` so the head fits in `limit`. A boundary is
 * used only when it leaves the head at least half full; otherwise the cut is
 * hard, at `limit`.
 */
export function findCut(text: string, limit: number): number {
  if (text.length <= limit) {
    return text.length;
  }
  const window = text.slice(0, limit);
  const minimum = Math.ceil(limit / 2);
  for (const { separator, offset } of BOUNDARIES) {
    const index = window.lastIndexOf(separator);
    if (index < 0) continue;
    const cut = index + offset;
    if (cut >= minimum && cut <= limit) {
      return cut;
    }
  }
  return limit;
}

/** Splits `text` into pieces of at most `limit` characters whose concatenation is `text`. */
export function splitText(text: string, limit: number): string[] {
  const pieces: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const cut = findCut(rest, limit);
    pieces.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length > 0) {
    pieces.push(rest);
  }
  return pieces;
}

/**
 * Packs segments (each at most `limit` long) into chunks in order, starting a
 * new chunk whenever the next segment would not fit. Appending segments only
 * ever changes the last chunk or adds new ones.
 */
export function packSegments(segments: readonly string[], limit: number): string[] {
  const chunks: string[] = [];
  let current = '';
  for (const segment of segments) {
    if (current.length > 0 && current.length + segment.length > limit) {
      chunks.push(current);
      current = '';
    }
    current += segment;
  }
  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}
