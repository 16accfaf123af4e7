import type { Metadata } from 'next';
import { site } from '@/lib/site';

interface BaseMeta {
  title?: string;
  description?: string;
  canonical?: string;
}

export function buildMeta({ title, description, canonical }: BaseMeta = {}): Metadata {
  const fullTitle = title ? `${title} · ${site.title}` : site.title;
  const summary = description || site.description;
  return {
    title: fullTitle,
    description: summary,
    metadataBase: new URL(site.url),
    alternates: {
      canonical: canonical ?? undefined,
      types: { 'application/atom+xml': '/feed.xml' },
    },
    openGraph: {
      title: fullTitle,
      description: summary,
      siteName: site.title,
      type: 'website',
    },
    twitter: {
      card: 'summary',
      title: fullTitle,
      description: summary,
    },
  };
}
