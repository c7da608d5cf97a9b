/**
 * frontend/src/spond-link/cookies.ts
 */

export const CSRF_COOKIE = 'csrftoken';

/** Reads one cookie from a `document.cookie` string; null when absent or not decodable. */
export function readCookie(cookieString: string, name: string): string | null {
  for (const part of cookieString.split(';')) {
    const [key, ...rest] = part.trim().split('=');
    if (key !== name) continue;
    try {
      return decodeURIComponent(rest.join('='));
    } catch {
      return null;
    }
  }
  return null;
}
