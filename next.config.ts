import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  reactStrictMode: true,
  /** Static HTML export for GitHub Pages; permalinks end in a slash like the old Jekyll URLs */
  output: 'export',
  trailingSlash: true,
};

export default nextConfig;
