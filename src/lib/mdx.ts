import type { Pluggable } from 'unified';

// Lazy import so plain .md builds never load the MDX toolchain.
export async function getMdxOptions(): Promise<{ remarkPlugins: Pluggable[]; rehypePlugins: Pluggable[] }> {
  const [remarkGfm, rehypeRaw, rehypeSlug, rehypeAutolinkHeadings, rehypePrettyCode] = await Promise.all([
    import('remark-gfm').then(m => m.default),
    import('rehype-raw').then(m => m.default),
    import('rehype-slug').then(m => m.default),
    import('rehype-autolink-headings').then(m => m.default),
    import('rehype-pretty-code').then(m => m.default),
  ]);
  return {
    remarkPlugins: [remarkGfm],
    rehypePlugins: [
      [rehypeRaw, { passThrough: ['mdxJsxTextElement', 'mdxJsxFlowElement', 'mdxFlowExpression', 'mdxTextExpression', 'mdxjsEsm'] }],
      rehypeSlug,
      [rehypePrettyCode, {
        theme: 'one-dark-pro',
        keepBackground: false,
        defaultLang: 'csharp',
        onVisitLine(node: { children: Array<{ type: string; value?: string }> }) {
          if (node.children.length === 0) node.children.push({ type: 'text', value: ' ' });
        },
        onVisitHighlightedLine(node: { properties: { className?: string[] } }) {
          node.properties.className = (node.properties.className || []).concat('line--highlight');
        },
      }],
      [rehypeAutolinkHeadings, { behavior: 'wrap' }],
    ],
  };
}
