const REGEX_SPECIALS = /[.+^${}()|[\]\\]/g;

/** True when the pattern uses `*` or `?` */
export function isGlob(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

/**
 * A plain string is treated as a prefix.
 */
export function toGlob(pattern: string): string {
  return isGlob(pattern) ? pattern : `${pattern}*`;
}

export function globToRegExp(glob: string): RegExp {
  const body = glob
    .replace(REGEX_SPECIALS, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${body}$`, 's');
}

export function matchesGlob(key: string, glob: string): boolean {
  return globToRegExp(glob).test(key);
}

/**
 * Namespace of a key for per-pattern analytics: `query:EGFR:1` → `query:*`.
 */
export function namespaceOf(key: string): string {
  const i = key.indexOf(':');
  return i === -1 ? key : `${key.slice(0, i)}:*`;
}
