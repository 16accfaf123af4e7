export type RouteItem = { label: string; href: string };

export const routes: RouteItem[] = [
  { label: 'Home', href: '/' },
  { label: 'Blog', href: '/blog/' },
  { label: 'Tags', href: '/tags/' },
  { label: 'About', href: '/about/' },
];
