import type { Metadata } from 'next';
import TagIndex from '@/components/TagIndex';
import { getAllPosts } from '@/lib/posts';
import { buildMeta } from '@/lib/seo';
import { groupPostsByTag } from '@/lib/tags';

export const metadata: Metadata = buildMeta({ title: 'Tags', description: 'Posts grouped by tag.', canonical: '/tags/' });

export default async function TagsPage() {
  const groups = groupPostsByTag(await getAllPosts());
  return (
    <section className="card space-y-6">
      <h1 className="text-2xl md:text-3xl font-semibold">Tags</h1>
      <TagIndex groups={groups} />
    </section>
  );
}
