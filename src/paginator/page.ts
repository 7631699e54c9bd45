import { EmbedBuilder } from 'discord.js';
import { codePointLength } from './segment.js';

export type TextPage = {
  readonly kind: 'text';
  readonly content: string;
  readonly title?: string;
  /** Prepended to the content, on its own line. */
  readonly prefix: string;
  /** Appended to the content, on its own line. */
  readonly suffix: string;
};

/** A pre-rendered embed supplied by the caller, displayed as-is. */
export type EmbedPage = {
  readonly kind: 'embed';
  readonly embed: EmbedBuilder;
};

export type PageEntry = TextPage | EmbedPage;

export const SUMMARY_WIDTH = 40;
const PLACEHOLDER = '...';

export function textPage(content: string, opts: { title?: string; prefix?: string; suffix?: string } = {}): TextPage {
  const page: TextPage = {
    kind: 'text',
    content,
    prefix: opts.prefix ?? '',
    suffix: opts.suffix ?? '',
    ...(opts.title ? { title: opts.title } : {}),
  };
  return Object.freeze(page);
}

export function embedPage(embed: EmbedBuilder): EmbedPage {
  const page: EmbedPage = { kind: 'embed', embed };
  return Object.freeze(page);
}

/**
 * Collapse whitespace and cut at a word boundary so the result, placeholder
 * included, fits in `width`. A first word that is already too long is cut hard.
 */
export function shorten(text: string, width = SUMMARY_WIDTH): string {
  const words = text.split(/\s+/).filter(Boolean);
  const collapsed = words.join(' ');
  if (codePointLength(collapsed) <= width) return collapsed;

  const room = width - PLACEHOLDER.length;
  let line = '';
  for (const word of words) {
    const next = line ? `${line} ${word}` : word;
    if (codePointLength(next) > room) break;
    line = next;
  }
  if (!line) line = Array.from(collapsed).slice(0, Math.max(room, 0)).join('');
  return line + PLACEHOLDER;
}

/** Short label used by the select menu: the title when there is one. */
export function pageSummary(page: PageEntry, index: number): string {
  if (page.kind === 'text') return page.title || shorten(page.content);
  const { title, description } = page.embed.data;
  if (title) return title;
  if (description) return shorten(description);
  return `Page ${index + 1}`;
}

/** A fresh embed for the page; pre-rendered embeds are copied, never mutated. */
export function pageEmbed(page: PageEntry): EmbedBuilder {
  if (page.kind === 'embed') return new EmbedBuilder(page.embed.toJSON());
  const embed = new EmbedBuilder().setDescription(`${page.prefix}\n${page.content}\n${page.suffix}`);
  if (page.title) embed.setTitle(page.title);
  return embed;
}
