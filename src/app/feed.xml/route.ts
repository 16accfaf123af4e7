import { buildAtomFeed } from '@/lib/feed';
import { log } from '@/lib/logger';
import { getAllPosts } from '@/lib/posts';
import { site } from '@/lib/site';

export const dynamic = 'force-static';

export async function GET() {
  const posts = await getAllPosts();
  log.info('Writing Atom feed', { entries: posts.length });
  return new Response(buildAtomFeed(posts, site), {
    headers: { 'Content-Type': 'application/atom+xml; charset=utf-8' },
  });
}
