import type { SiteConfig } from '@/lib/site';
import type { PostSummary } from '@/types/post';

const XML_ESCAPES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&apos;' };

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, c => XML_ESCAPES[c] ?? c);
}

type FeedSite = Pick<SiteConfig, 'url' | 'title' | 'description' | 'author'>;

/** Atom 1.0 document for `posts`, entries in the order given. */
export function buildAtomFeed(posts: readonly PostSummary[], site: FeedSite): string {
  const updated = posts.reduce((latest, p) => (p.date > latest ? p.date : latest), new Date(0).toISOString());
  const entries = posts.map(p => {
    const link = escapeXml(`${site.url}${p.permalink}`);
    return [
      '  <entry>',
      `    <title>${escapeXml(p.title)}</title>`,
      `    <link href="${link}"/>`,
      `    <id>${link}</id>`,
      `    <updated>${p.date}</updated>`,
      ...(p.description ? [`    <summary>${escapeXml(p.description)}</summary>`] : []),
      ...p.tags.map(t => `    <category term="${escapeXml(t)}"/>`),
      '  </entry>',
    ].join('\n');
  });
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    `  <title>${escapeXml(site.title)}</title>`,
    `  <subtitle>${escapeXml(site.description)}</subtitle>`,
    `  <link href="${escapeXml(site.url)}/feed.xml" rel="self"/>`,
    `  <link href="${escapeXml(site.url)}/"/>`,
    `  <id>${escapeXml(site.url)}/</id>`,
    `  <updated>${updated}</updated>`,
    `  <author><name>${escapeXml(site.author)}</name></author>`,
    ...entries,
    '</feed>',
    '',
  ].join('\n');
}
