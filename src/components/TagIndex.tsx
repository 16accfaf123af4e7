import Link from 'next/link';
import { formatPostDate } from '@/lib/dates';
import type { TagGroup } from '@/types/post';

/** One heading and one list per tag, in the order the groups are given. */
export default function TagIndex({ groups }: { groups: TagGroup[] }) {
  if (groups.length === 0) {
    return <p className="text-[color:var(--muted)]">No tags yet.</p>;
  }
  return (
    <div className="space-y-8">
      {groups.map(g => (
        <section key={g.anchor} className="space-y-2">
          <h2 id={g.anchor} className="text-xl font-semibold">{g.tag}</h2>
          <ul className="list-disc pl-6 space-y-1">
            {g.posts.map(p => (
              <li key={p.permalink}>
                <Link href={p.permalink}>{p.title}</Link>
                {' '}
                <time dateTime={p.date} className="text-xs text-[color:var(--muted)]">{formatPostDate(p.date)}</time>
              </li>
            ))}
          </ul>
        </section>
      ))}
    </div>
  );
}
