import { ConfigError } from './errors.js';

export const DEFAULT_PAGE_SIZE = 4000;

// only ASCII whitespace breaks words; NBSP and friends stay inside them
const WHITESPACE_RUN = /([\t\n\v\f\r ]+)/;
const isBlank = (chunk: string) => /^[\t\n\v\f\r ]*$/.test(chunk);

/** Length in code points, so astral characters such as emoji count once. */
export const codePointLength = (s: string) => Array.from(s).length;

/**
 * Word-wrap `text` into chunks of at most `width` code points.
 *
 * Words break on whitespace only (hyphenated words stay whole), words longer
 * than `width` are split, and whitespace inside a chunk is kept verbatim.
 * Whitespace runs that land on a chunk boundary are dropped.
 */
export function wrapText(text: string, width: number): string[] {
  if (!Number.isInteger(width) || width < 1) {
    throw new ConfigError(`Page width must be a positive integer, got ${width}`);
  }
  // used as a stack: next chunk is at the end
  const chunks = text.split(WHITESPACE_RUN).filter(Boolean).reverse();
  const lines: string[] = [];

  while (chunks.length) {
    const cur: string[] = [];
    let len = 0;

    if (lines.length && isBlank(chunks[chunks.length - 1])) chunks.pop();

    while (chunks.length) {
      const next = chunks[chunks.length - 1];
      const size = codePointLength(next);
      if (len + size > width) break;
      cur.push(next);
      chunks.pop();
      len += size;
    }

    // a chunk wider than a whole page is split to fill the rest of this one
    if (chunks.length && codePointLength(chunks[chunks.length - 1]) > width) {
      const room = width - len;
      if (room > 0) {
        const long = Array.from(chunks[chunks.length - 1]);
        cur.push(long.slice(0, room).join(''));
        chunks[chunks.length - 1] = long.slice(room).join('');
      }
    }

    if (cur.length && isBlank(cur[cur.length - 1])) cur.pop();
    if (cur.length) lines.push(cur.join(''));
  }

  return lines;
}

/**
 * Pack entries into pages without ever splitting one. Each entry is followed
 * by a newline; an entry that cannot fit in the current page starts the next.
 *
 * @param entries - Lines of text, kept verbatim
 * @param pageSize - Maximum characters per page; a single entry longer than this gets a page of its own
 * @returns Page bodies
 */
export function packEntries(entries: readonly string[], pageSize = DEFAULT_PAGE_SIZE): string[] {
  const pages: string[] = [];
  let cur = '';

  for (const entry of entries) {
    const add = entry.length + 1; // +1 for newline
    if (cur.length + add > pageSize && cur.length > 0) {
      pages.push(cur);
      cur = `${entry}\n`;
    } else {
      cur += `${entry}\n`;
    }
  }

  if (cur.length) {
    pages.push(cur);
  }

  return pages;
}
