import type { Metadata } from 'next';
import Link from 'next/link';
import { getAllPages } from '@/lib/posts';
import { buildMeta } from '@/lib/seo';
import { site } from '@/lib/site';
import './globals.css';
import Nav from '@/components/Nav';

export const metadata: Metadata = buildMeta({ description: site.description });

export default async function RootLayout({ children }: { children: React.ReactNode }) {
  const pages = await getAllPages();
  return (
    <html lang={site.locale}>
      <body>
        <Nav siteTitle={site.title} />
        <main className="container py-8 space-y-8 min-h-dvh">
          {children}
        </main>
        <footer className="container py-6 text-xs text-[color:var(--muted)] space-x-2">
          <span>© {site.author}</span>
          {pages.map(p => (
            <Link key={p.permalink} href={p.permalink}>{p.title}</Link>
          ))}
          <a href="/feed.xml">Atom feed</a>
        </footer>
      </body>
    </html>
  );
}
