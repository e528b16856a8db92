/**
 * Resolve `href` against `base` and drop the fragment. Returns null for
 * anchors, javascript: links and anything that is not http(s).
 */
export function toAbsoluteUrl(href: string | undefined | null, base: string): string | null {
  const trimmed = (href ?? '').trim();
  if (!trimmed || trimmed.startsWith('#') || /^(javascript|mailto|tel):/i.test(trimmed)) {
    return null;
  }

  try {
    const url = new URL(trimmed, base);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

export function isSameOrigin(url: string, base: string): boolean {
  try {
    return new URL(url).host.toLowerCase() === new URL(base).host.toLowerCase();
  } catch {
    return false;
  }
}

export function pathSegments(url: string): string[] {
  try {
    return new URL(url).pathname
      .split('/')
      .map((segment) => decodeURIComponent(segment).toLowerCase())
      .filter(Boolean);
  } catch {
    return [];
  }
}

export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}
