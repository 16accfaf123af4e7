import Link from 'next/link';
import TagLinks from '@/components/TagLinks';
import { formatPostDate } from '@/lib/dates';
import type { Post } from '@/types/post';

export default function PostList({ posts, anchors }: { posts: Post[]; anchors: Map<string, string> }) {
  return (
    <ul className="grid gap-4 md:grid-cols-2">
      {posts.map((p) => (
        <li key={p.permalink} className="card space-y-2">
          <h2 className="text-xl font-semibold">
            <Link href={p.permalink}>{p.title}</Link>
          </h2>
          <p className="text-xs text-[color:var(--muted)]">{formatPostDate(p.date)}</p>
          {p.description && <p className="text-sm text-[color:var(--muted)]">{p.description}</p>}
          <TagLinks tags={p.tags} anchors={anchors} />
        </li>
      ))}
    </ul>
  );
}
