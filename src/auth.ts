export const AUTHORIZATION = 'Authorization';

export const DEFAULT_KEY_PREFIX = 'KakaoAK';

// An empty secret still yields the bare prefix and trailing space.
export function formatKey(secret: string, prefix: string = DEFAULT_KEY_PREFIX): string {
  return `${prefix} ${secret.trim()}`;
}
