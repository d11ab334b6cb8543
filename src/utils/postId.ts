/**
 * Pull the shortcode out of an Instagram post or reel URL.
 *
 *   https://www.instagram.com/reel/C8mtEPSp4b8/   -> C8mtEPSp4b8
 *   https://www.instagram.com/p/ABC123456/        -> ABC123456
 *   https://www.instagram.com/reel/XYZ789?igsh=1  -> XYZ789
 */
export function extractPostIdFromUrl(url: unknown): string | null {
  if (typeof url !== 'string') return null;

  const withoutQuery = url.trim().split(/[?#]/)[0].replace(/\/+$/, '');
  if (!withoutQuery) return null;

  const parts = withoutQuery.split('/');
  const pIndex = parts.indexOf('p');
  if (pIndex !== -1 && pIndex + 1 < parts.length) {
    return parts[pIndex + 1] || null;
  }

  return parts[parts.length - 1] || null;
}
