"use client";
import * as React from 'react';
import { MDXRemote, type MDXRemoteSerializeResult } from 'next-mdx-remote';

const CodeBlock = (props: React.HTMLAttributes<HTMLElement>) => (
  <pre className="overflow-auto rounded-md border border-[color:var(--border)] bg-[color:var(--surface)] p-4 text-sm" {...props} />
);

// Callout box usable from .mdx posts: <Note title="Heads up">...</Note>
const Note = ({ title, children }: { title?: string; children?: React.ReactNode }) => (
  <aside className="my-4 rounded-md border-l-4 border-blue-500 bg-[color:var(--surface)] px-4 py-2 text-sm">
    {title && <strong className="block">{title}</strong>}
    {children}
  </aside>
);

const components: React.ComponentProps<typeof MDXRemote>['components'] = {
  pre: CodeBlock,
  Note,
};

export default function MdxRenderer({ code }: { code: MDXRemoteSerializeResult }) {
  return (
    <div className="prose prose-invert max-w-none">
      <MDXRemote {...code} components={components} />
    </div>
  );
}
