/**
 * Case-insensitive app name and domain-suffix matching shared by the focus
 * and routing policies. Lists are read, never mutated.
 */

export function normalizeDomain(value: string): string {
  return value.trim().toLowerCase().replace(/^\.+/, '').replace(/\.+$/, '');
}

export function normalizeAppName(value: string): string {
  return value.trim().toLocaleLowerCase();
}

export function sameAppName(a: string, b: string): boolean {
  const left = normalizeAppName(a);
  return left.length > 0 && left === normalizeAppName(b);
}

export function matchesAppName(appName: string, candidates: readonly string[]): boolean {
  return candidates.some((candidate) => sameAppName(appName, candidate));
}

/** True when `host` equals `domain` or is one of its subdomains. */
export function hostMatchesDomain(host: string, domain: string): boolean {
  const h = normalizeDomain(host);
  const d = normalizeDomain(domain);
  if (!h || !d) return false;
  return h === d || h.endsWith(`.${d}`);
}

export function matchesDomain(host: string | null, domains: readonly string[]): boolean {
  if (!host) return false;
  return domains.some((domain) => hostMatchesDomain(host, domain));
}

/**
 * Reduces a URL (or a bare host) to its lowercased host name.
 * Returns null for anything without a host, such as `about:blank`.
 */
export function extractHost(url: string | null | undefined): string | null {
  if (!url) return null;
  const trimmed = url.trim();
  if (!trimmed) return null;

  if (trimmed.includes('://')) {
    try {
      const hostname = new URL(trimmed).hostname.toLowerCase();
      return hostname || null;
    } catch {
      return null;
    }
  }

  const bare = trimmed.split('/')[0]?.split(':')[0]?.trim().toLowerCase() ?? '';
  return bare.includes('.') ? bare : null;
}
