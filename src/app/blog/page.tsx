import type { Metadata } from 'next';
import PostList from '@/components/PostList';
import { getAllPosts } from '@/lib/posts';
import { buildMeta } from '@/lib/seo';
import { tagAnchors } from '@/lib/tags';

export const metadata: Metadata = buildMeta({ title: 'Blog', canonical: '/blog/' });

export default async function BlogIndex() {
  const sorted = await getAllPosts();
  return (
    <section className="space-y-6">
      <div className="card">
        <h1 className="text-2xl md:text-3xl font-semibold">Blog</h1>
        <p className="text-[color:var(--muted)]">{sorted.length} posts, newest first.</p>
      </div>
      <PostList posts={sorted} anchors={tagAnchors(sorted)} />
    </section>
  );
}
