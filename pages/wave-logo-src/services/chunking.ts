const VENDOR_CHUNKS: [string, string][] = [
  ['react-dom', 'react-vendor'],
  ['react', 'react-vendor'],
  ['scheduler', 'react-vendor'],
  ['katex', 'math-vendor'],
  ['lucide-react', 'icons-vendor']
];

/** Rollup `manualChunks` hook: one chunk per vendor family, app code left alone. */
export const chunkSplit = (id: string) => {
  const normalized = id.replace(/\\/g, '/');
  if (!normalized.includes('/node_modules/')) return undefined;
  const match = VENDOR_CHUNKS.find(([pkg]) => normalized.includes(`/node_modules/${pkg}/`));
  return match ? match[1] : 'vendor';
};
