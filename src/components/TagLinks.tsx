import Link from 'next/link';
import { tagHref } from '@/lib/tags';

export default function TagLinks({ tags, anchors }: { tags: string[]; anchors: Map<string, string> }) {
  if (tags.length === 0) return null;
  return (
    <ul className="flex flex-wrap gap-2 text-xs" aria-label="Tags">
      {tags.map(tag => {
        const anchor = anchors.get(tag);
        return (
          <li key={tag} className="rounded border border-[color:var(--border)] px-2 py-0.5">
            {anchor ? <Link href={tagHref({ anchor })}>#{tag}</Link> : <span>#{tag}</span>}
          </li>
        );
      })}
    </ul>
  );
}
