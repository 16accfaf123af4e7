import type { ReactNode } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it, vi } from 'vitest';
import TagLinks from '@/components/TagLinks';

vi.mock('next/link', async () => {
  const { createElement } = await import('react');
  return {
    default: ({ href, children }: { href: string; children?: ReactNode }) => createElement('a', { href }, children),
  };
});

describe('TagLinks', () => {
  it('links indexed tags and prints the rest as text', () => {
    const html = renderToStaticMarkup(<TagLinks tags={['C#', 'draft']} anchors={new Map([['C#', 'c']])} />);
    expect(html).toContain('<a href="/tags/#c">#C#</a>');
    expect(html).toContain('<span>#draft</span>');
  });

  it('renders nothing without tags', () => {
    expect(renderToStaticMarkup(<TagLinks tags={[]} anchors={new Map()} />)).toBe('');
  });
});
