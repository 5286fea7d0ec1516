import type { CapabilityCatalog, CapabilityEntry } from "./model/SpecDocument.js";

export interface ScoredCapability {
  entry: CapabilityEntry;
  score: number;
}

export function buildMatchText(feature: string, requirements: readonly string[]): string {
  return `${feature} ${requirements.join(" ")}`.toLowerCase();
}

/**
 * Counts keyword hits per entry. Keywords match as plain substrings, so
 * "validation" also hits "invalidation". Zero-score entries are dropped and
 * ties keep catalog order.
 */
export function scoreCapabilities(
  feature: string,
  requirements: readonly string[],
  catalog: CapabilityCatalog
): ScoredCapability[] {
  const text = buildMatchText(feature, requirements);
  const scored: ScoredCapability[] = [];
  for (const entry of catalog.entries) {
    let score = 0;
    for (const keyword of entry.keywords) {
      if (text.includes(keyword.toLowerCase())) {
        score += 1;
      }
    }
    if (score > 0) {
      scored.push({ entry, score });
    }
  }
  return scored.sort((a, b) => b.score - a.score);
}

export function matchCapabilities(
  feature: string,
  requirements: readonly string[],
  catalog: CapabilityCatalog
): string[] {
  const result: string[] = [];
  for (const { entry } of scoreCapabilities(feature, requirements, catalog)) {
    if (!result.includes(entry.tag)) {
      result.push(entry.tag);
    }
  }
  for (const tag of catalog.coreTags) {
    if (!result.includes(tag)) {
      result.push(tag);
    }
  }
  return result.slice(0, catalog.limit);
}
