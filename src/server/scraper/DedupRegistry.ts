// ============================================================================
// DEDUP REGISTRY
// ============================================================================
// Canonical detail URLs already processed in the current run

/**
 * Canonical form of a listing URL: absolute, https for protocol-relative
 * input, no query string and no fragment. Idempotent.
 */
export function canonicalize(url: string, baseUrl: string): string {
  const trimmed = url.trim();
  const absolute = trimmed.startsWith('//') ? `https:${trimmed}` : trimmed;

  let parsed: URL;
  try {
    parsed = new URL(absolute, baseUrl);
  } catch {
    // Unparsable input: strip query and fragment textually
    return absolute.split('#')[0].split('?')[0];
  }

  parsed.search = '';
  parsed.hash = '';
  return parsed.href;
}

export class DedupRegistry {
  private seen = new Set<string>();

  constructor(private readonly baseUrl: string) {}

  canonicalize(url: string): string {
    return canonicalize(url, this.baseUrl);
  }

  hasSeen(url: string): boolean {
    return this.seen.has(this.canonicalize(url));
  }

  /**
   * Mark a URL as processed and return its canonical form
   */
  record(url: string): string {
    const canonical = this.canonicalize(url);
    this.seen.add(canonical);
    return canonical;
  }

  get size(): number {
    return this.seen.size;
  }
}
