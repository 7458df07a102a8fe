const LABEL_PATTERN = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.+$/, "")
}

/**
 * Returns the canonical form of a queried name, or null when it cannot be a
 * DNS name (empty, empty label, over-long label or name, stray characters).
 */
export function canonicalizeDomain(raw: string): string | null {
  const domain = normalizeDomain(raw)
  if (domain.length === 0 || domain.length > 253) {
    return null
  }

  for (const label of domain.split(".")) {
    if (!LABEL_PATTERN.test(label)) {
      return null
    }
  }

  return domain
}

export function hostMatchesRule(host: string, rule: string): boolean {
  const normalizedHost = normalizeDomain(host)
  const normalizedRule = normalizeDomain(rule)

  return normalizedHost === normalizedRule || normalizedHost.endsWith(`.${normalizedRule}`)
}

export function matchIgnoreRule(domain: string, ignoreList: readonly string[]): string | null {
  for (const rule of ignoreList) {
    if (hostMatchesRule(domain, rule)) {
      return rule
    }
  }

  return null
}
