const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

export const NO_COLOR = 'none';

export const isHexColor = (value: string) => HEX_COLOR.test(value.trim());

export const isValidColor = (value: string, allowNone = false) =>
  isHexColor(value) || (allowNone && value.trim().toLowerCase() === NO_COLOR);

/** `#abc` → `#aabbcc`, lower case. Returns null for anything else. */
export const normalizeHexColor = (value: string): string | null => {
  const v = value.trim().toLowerCase();
  if (!HEX_COLOR.test(v)) return null;
  if (v.length === 7) return v;
  return `#${v[1]}${v[1]}${v[2]}${v[2]}${v[3]}${v[3]}`;
};

// <input type="color"> only takes #rrggbb; fall back for `none`.
export const toColorInputValue = (value: string, fallback = '#000000') => normalizeHexColor(value) ?? fallback;

const escapes: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

export const escapeXml = (value: string) => value.replace(/[&<>"']/g, (ch) => escapes[ch] ?? ch);
