import { describe, expect, it } from 'vitest';
import { buildAtomFeed, escapeXml } from '@/lib/feed';

const site = { url: 'https://example.test', title: 'Notes', description: 'd', author: 'Test Author' };

describe('buildAtomFeed', () => {
  it('writes one entry per post in the given order', () => {
    const xml = buildAtomFeed(
      [
        { title: 'A & B', permalink: '/a/', date: '2020-02-01T00:00:00.000Z', tags: ['x'], description: '<intro>' },
        { title: 'C', permalink: '/c/', date: '2020-01-01T00:00:00.000Z', tags: [] },
      ],
      site,
    );
    expect(xml).toBe([
      '<?xml version="1.0" encoding="utf-8"?>',
      '<feed xmlns="http://www.w3.org/2005/Atom">',
      '  <title>Notes</title>',
      '  <subtitle>d</subtitle>',
      '  <link href="https://example.test/feed.xml" rel="self"/>',
      '  <link href="https://example.test/"/>',
      '  <id>https://example.test/</id>',
      '  <updated>2020-02-01T00:00:00.000Z</updated>',
      '  <author><name>Test Author</name></author>',
      '  <entry>',
      '    <title>A &amp; B</title>',
      '    <link href="https://example.test/a/"/>',
      '    <id>https://example.test/a/</id>',
      '    <updated>2020-02-01T00:00:00.000Z</updated>',
      '    <summary>&lt;intro&gt;</summary>',
      '    <category term="x"/>',
      '  </entry>',
      '  <entry>',
      '    <title>C</title>',
      '    <link href="https://example.test/c/"/>',
      '    <id>https://example.test/c/</id>',
      '    <updated>2020-01-01T00:00:00.000Z</updated>',
      '  </entry>',
      '</feed>',
      '',
    ].join('\n'));
  });

  it('has no entries and an epoch update time when empty', () => {
    const xml = buildAtomFeed([], site);
    expect(xml).not.toContain('<entry>');
    expect(xml.split('\n')[7]).toBe('  <updated>1970-01-01T00:00:00.000Z</updated>');
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`Tom's <"C#"> & more`)).toBe('Tom&apos;s &lt;&quot;C#&quot;&gt; &amp; more');
  });
});
