import { RetrievedChunk } from './types';

export const DEFAULT_MAX_CONTEXT_CHARS = 8000;

const BLOCK_SEPARATOR = '\n\n';

/** One chunk that made it into the prompt context. */
export interface ContextEntry {
  /** 1-based tag the generation agents cite, as in "[2]" */
  index: number;
  chunk: RetrievedChunk;
  /** Character range of `chunk.content` actually placed in the context */
  range: { start: number; end: number };
  excerpt: string;
}

export interface FormattedContext {
  text: string;
  entries: ContextEntry[];
  /** True when the first chunk had to be cut to fit the budget */
  truncated: boolean;
}

export const EMPTY_CONTEXT: FormattedContext = { text: '', entries: [], truncated: false };

function sourceHeader(index: number, chunk: RetrievedChunk): string {
  const where = [chunk.metadata.filename, chunk.metadata.locator].filter((part): part is string => !!part);
  const suffix = where.length > 0 ? ` (${where.join(', ')})` : '';
  return `[${index}] ${chunk.metadata.title}${suffix}\n`;
}

function isDuplicate(content: string, included: ContextEntry[]): boolean {
  return included.some(({ chunk }) => {
    const other = chunk.content.trim();
    return other.startsWith(content) || other.endsWith(content);
  });
}

/**
 * Pack chunks, in the order given, into a context of at most `maxChars`
 * characters. Stops at the first chunk that would overflow. A first chunk
 * that overflows on its own is truncated instead, so a non-empty input
 * never yields an empty context.
 */
export function assembleContext(chunks: RetrievedChunk[], maxChars: number = DEFAULT_MAX_CONTEXT_CHARS): FormattedContext {
  const entries: ContextEntry[] = [];
  let text = '';
  let truncated = false;

  for (const chunk of chunks) {
    const content = chunk.content.trim();
    if (!content) continue;
    if (isDuplicate(content, entries)) continue;

    const index = entries.length + 1;
    const header = sourceHeader(index, chunk);
    const separator = entries.length > 0 ? BLOCK_SEPARATOR : '';
    const block = header + content;

    if (text.length + separator.length + block.length <= maxChars) {
      text += separator + block;
      entries.push({ index, chunk, range: rangeOf(chunk.content, content, content.length), excerpt: content });
      continue;
    }

    if (entries.length === 0 && maxChars > 0) {
      const room = Math.max(0, maxChars - header.length);
      const excerpt = content.slice(0, room);
      text = (header + excerpt).slice(0, maxChars);
      entries.push({ index, chunk, range: rangeOf(chunk.content, content, excerpt.length), excerpt });
      truncated = true;
    }
    break;
  }

  return { text, entries, truncated };
}

/** Range of the first `length` trimmed characters, in untrimmed coordinates */
function rangeOf(raw: string, trimmed: string, length: number): { start: number; end: number } {
  const start = raw.indexOf(trimmed);
  return { start, end: start + length };
}
