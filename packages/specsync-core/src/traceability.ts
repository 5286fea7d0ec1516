import type { CodeReference, ScanResult, SpecDocument, SyncReport } from "./model/SpecDocument.js";
import { compareIds } from "./model/SpecDocument.js";

export const TRACKED_PREFIX = "REQ-";

export function trackedRequirementIds(document: Pick<SpecDocument, "requirements">): string[] {
  return document.requirements.map((requirement) => requirement.id).filter((id) => id.startsWith(TRACKED_PREFIX));
}

export function computeTraceability(
  document: Pick<SpecDocument, "specId" | "feature" | "requirements">,
  scan: ScanResult
): SyncReport {
  const ids = trackedRequirementIds(document);
  const implemented = new Set<string>();
  const missing = new Set<string>();
  for (const id of ids) {
    if (scan.references.has(id)) {
      implemented.add(id);
    } else {
      missing.add(id);
    }
  }
  return {
    specId: document.specId,
    feature: document.feature,
    totalRequirements: ids.length,
    implemented,
    missing,
    sourceFiles: scan.sourceFiles,
    testFiles: scan.testFiles,
    references: scan.references,
    testMethodCount: scan.testMethodCount,
  };
}

export function coveragePercent(report: Pick<SyncReport, "implemented" | "totalRequirements">): number {
  if (report.totalRequirements === 0) return 0;
  return (report.implemented.size / report.totalRequirements) * 100;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function sortedIds(ids: Iterable<string>): string[] {
  return Array.from(ids).sort(compareIds);
}

export function allRequirementIds(report: Pick<SyncReport, "implemented" | "missing">): string[] {
  return sortedIds(new Set([...report.implemented, ...report.missing]));
}

export function referencesFor(report: Pick<SyncReport, "references">, id: string): readonly CodeReference[] {
  return report.references.get(id) ?? [];
}
