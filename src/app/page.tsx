import Link from 'next/link';
import PostList from '@/components/PostList';
import { getAllPosts } from '@/lib/posts';
import { site } from '@/lib/site';
import { tagAnchors } from '@/lib/tags';

const LATEST = 5;

export default async function Page() {
  const posts = await getAllPosts();
  const anchors = tagAnchors(posts);
  return (
    <section className="space-y-6">
      <div className="card space-y-2">
        <h1 className="text-2xl md:text-3xl font-semibold">{site.title}</h1>
        <p className="text-[color:var(--muted)]">{site.description}</p>
      </div>
      <PostList posts={posts.slice(0, LATEST)} anchors={anchors} />
      {posts.length > LATEST && (
        <p><Link className="btn btn-primary" href="/blog/">All posts →</Link></p>
      )}
    </section>
  );
}
