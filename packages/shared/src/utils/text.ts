/** Cuts on code points so surrogate pairs stay whole. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max).join('') + '...';
}

export function sliceChars(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

/** Hide credentials embedded in a URL before it reaches a log line. */
export function maskUrl(raw: string): string {
  try {
    const url = new URL(raw);
    if (url.username || url.password) {
      url.username = '***';
      url.password = '';
    }
    return url.toString();
  } catch {
    return raw.replace(/\/\/[^/@]+@/, '//***@');
  }
}

export function maskSecret(value: string | undefined): string | undefined {
  if (!value) return value;
  if (value.length <= 8) return '***';
  return `${value.slice(0, 4)}***`;
}
