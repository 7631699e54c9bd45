import { describe, test, expect } from '@jest/globals';
import { EmbedBuilder } from 'discord.js';
import { embedPage, pageEmbed, pageSummary, shorten, textPage } from '../src/paginator/page.js';

describe('shorten', () => {
  test('returns short text with whitespace collapsed', () => {
    expect(shorten('short text')).toBe('short text');
    expect(shorten('a \n\n b')).toBe('a b');
  });

  test('cuts at a word boundary and appends the placeholder', () => {
    const out = shorten('Lorem ipsum dolor sit amet, consectetur adipiscing elit');
    expect(out).toBe('Lorem ipsum dolor sit amet,...');
  });

  test('cuts a single oversized word hard', () => {
    const out = shorten('x'.repeat(50));
    expect(out).toBe(`${'x'.repeat(37)}...`);
    expect(out.length).toBe(40);
  });

  test('measures emoji as single characters', () => {
    expect(shorten('😀'.repeat(40))).toBe('😀'.repeat(40));
    expect(shorten('😀'.repeat(41))).toBe(`${'😀'.repeat(37)}...`);
  });
});

describe('pages', () => {
  test('text pages are frozen and default prefix/suffix to empty', () => {
    const page = textPage('body');
    expect(Object.isFrozen(page)).toBe(true);
    expect(page).toEqual({ kind: 'text', content: 'body', prefix: '', suffix: '' });
  });

  test('summary prefers the title', () => {
    expect(pageSummary(textPage('body text', { title: 'Intro' }), 0)).toBe('Intro');
    expect(pageSummary(textPage('body   text'), 0)).toBe('body text');
  });

  test('embed summary falls back to description, then page number', () => {
    expect(pageSummary(embedPage(new EmbedBuilder().setTitle('Stats')), 0)).toBe('Stats');
    expect(pageSummary(embedPage(new EmbedBuilder().setDescription('only a description')), 0)).toBe('only a description');
    expect(pageSummary(embedPage(new EmbedBuilder()), 2)).toBe('Page 3');
  });

  test('text page renders prefix, content and suffix on separate lines', () => {
    const embed = pageEmbed(textPage('body', { title: 'T', prefix: '```', suffix: '```' })).toJSON();
    expect(embed.description).toBe('```\nbody\n```');
    expect(embed.title).toBe('T');
  });

  test('pre-rendered embeds are copied', () => {
    const original = new EmbedBuilder().setTitle('Original');
    const copy = pageEmbed(embedPage(original));
    copy.setTitle('Changed');
    expect(original.data.title).toBe('Original');
  });
});
