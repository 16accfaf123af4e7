import type { ReactNode } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it, vi } from 'vitest';
import TagIndex from '@/components/TagIndex';
import { groupPostsByTag } from '@/lib/tags';
import type { PostSummary } from '@/types/post';

vi.mock('next/link', async () => {
  const { createElement } = await import('react');
  return {
    default: ({ href, children }: { href: string; children?: ReactNode }) => createElement('a', { href }, children),
  };
});

const a: PostSummary = { title: 'A', permalink: '/a/', date: '2018-03-05T00:00:00.000Z', tags: ['x', 'y'] };
const b: PostSummary = { title: 'B', permalink: '/b/', date: '2018-01-14T00:00:00.000Z', tags: ['y'] };

const render = (posts: PostSummary[]) => renderToStaticMarkup(<TagIndex groups={groupPostsByTag(posts)} />);
const count = (html: string, needle: string) => html.split(needle).length - 1;

describe('TagIndex', () => {
  it('renders one heading and one list per tag in order', () => {
    const html = render([a, b]);
    expect([...html.matchAll(/<h2 id="([^"]+)"/g)].map(m => m[1])).toEqual(['x', 'y']);
    expect(count(html, '<ul')).toBe(2);
    expect(count(html, '<li>')).toBe(3);
  });

  it('links every post under each of its tags', () => {
    const html = render([a, b]);
    expect(count(html, '<a href="/a/">A</a>')).toBe(2);
    expect(count(html, '<a href="/b/">B</a>')).toBe(1);
    const [, ySection] = html.split('<h2 id="y"');
    expect(ySection.indexOf('/a/')).toBeLessThan(ySection.indexOf('/b/'));
  });

  it('shows the formatted date beside each link', () => {
    const html = render([b]);
    expect(html).toContain('January 14, 2018</time></li>');
  });

  it('says so when there are no tags', () => {
    expect(render([])).toBe('<p class="text-[color:var(--muted)]">No tags yet.</p>');
    expect(render([{ ...a, tags: [] }])).toBe('<p class="text-[color:var(--muted)]">No tags yet.</p>');
  });

  it('renders identical markup for the same posts', () => {
    expect(render([a, b])).toBe(render([a, b]));
  });
});
