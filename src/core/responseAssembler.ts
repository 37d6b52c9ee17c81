/**
 * Splits outbound text into transport-sized chunks
 */

export interface AssembleOptions {
  maxChunkLength: number;
  /** Multi-character tokens a chunk boundary must never fall inside */
  protectedPatterns?: RegExp[];
}

/** Markdown emphasis, code fences, Slack link/mention tokens and :emoji: codes */
export const DEFAULT_PROTECTED_PATTERNS: RegExp[] = [
  /```/g,
  /\*\*/g,
  /~~/g,
  /<[^<>\n]{1,200}>/g,
  /:[a-z0-9_+-]{1,40}:/g,
  /[\uD800-\uDBFF][\uDC00-\uDFFF]/g
];

interface Span {
  start: number;
  end: number;   // exclusive
}

export function normalizeText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{4,}/g, '\n\n\n')
    .trim();
}

function findProtectedSpans(text: string, patterns: RegExp[]): Span[] {
  const spans: Span[] = [];
  for (const pattern of patterns) {
    const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
    for (const match of text.matchAll(new RegExp(pattern.source, flags))) {
      if (match.index === undefined || match[0].length < 2) continue;
      spans.push({ start: match.index, end: match.index + match[0].length });
    }
  }
  return spans.sort((a, b) => a.start - b.start);
}

/**
 * Pick the cut position for a chunk starting at `from`. Prefers the last line
 * break in the back half of the window, otherwise cuts at the limit, then backs
 * out of any protected token the cut would split.
 */
function chooseCut(text: string, from: number, max: number, spans: Span[]): number {
  let cut = from + max;

  const newline = text.lastIndexOf('\n', cut);
  if (newline > from + Math.floor(max / 2)) {
    cut = newline;
  }

  let moved = true;
  while (moved) {
    moved = false;
    for (const span of spans) {
      if (span.start >= cut) break;
      if (cut < span.end && span.start > from) {
        cut = span.start;
        moved = true;
        break;
      }
    }
  }
  return cut;
}

/**
 * Lazily yield chunks no longer than `maxChunkLength`, in order.
 * The returned generator is single-use.
 */
export function* assemble(rawText: string, options: AssembleOptions): Generator<string, void, undefined> {
  const max = options.maxChunkLength;
  if (max < 1) {
    throw new RangeError(`maxChunkLength must be positive, got ${max}`);
  }

  const text = normalizeText(rawText);
  const spans = findProtectedSpans(text, options.protectedPatterns ?? DEFAULT_PROTECTED_PATTERNS);

  let position = 0;
  while (position < text.length) {
    if (text.length - position <= max) {
      yield text.slice(position);
      return;
    }

    const cut = chooseCut(text, position, max, spans);
    const chunk = text.slice(position, cut);
    if (chunk.length > 0) {
      yield chunk;
    }
    // a line break used as the boundary is consumed, not carried into the next chunk
    position = text[cut] === '\n' ? cut + 1 : cut;
  }
}
