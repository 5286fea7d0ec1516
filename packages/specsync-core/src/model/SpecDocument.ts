export type RequirementKind = "U" | "S" | "E" | "O" | "N";

/** EARS order: Ubiquitous, State-driven, Event-driven, Optional, uNwanted behaviour. */
export const REQUIREMENT_KINDS: readonly RequirementKind[] = ["U", "S", "E", "O", "N"];

export type SpecStatus = "draft" | "reviewed" | "approved" | (string & {});

export interface Requirement {
  readonly id: string;
  readonly kind: RequirementKind;
  readonly description: string;
}

export interface SpecDocument {
  specId: string;
  feature: string;
  status: SpecStatus;
  version: string;
  author: string;
  date: string;
  relatedCapabilities: string[];
  requirements: Requirement[];
  purpose: string;
}

export interface CodeReference {
  readonly filePath: string;
  /** 1-based. */
  readonly line: number;
  readonly requirementId: string;
  readonly inTestFile: boolean;
}

export interface ScanResult {
  references: ReadonlyMap<string, readonly CodeReference[]>;
  sourceFiles: readonly string[];
  testFiles: readonly string[];
  testMethodCount: number;
}

export interface SyncReport {
  specId: string;
  feature: string;
  totalRequirements: number;
  implemented: ReadonlySet<string>;
  missing: ReadonlySet<string>;
  sourceFiles: readonly string[];
  testFiles: readonly string[];
  references: ReadonlyMap<string, readonly CodeReference[]>;
  testMethodCount: number;
}

export interface CapabilityEntry {
  readonly tag: string;
  readonly category: string;
  readonly keywords: readonly string[];
  readonly description: string;
}

export interface CapabilityCatalog {
  readonly entries: readonly CapabilityEntry[];
  /** Always appended to a match result when missing. */
  readonly coreTags: readonly string[];
  readonly limit: number;
}

export function isRequirementKind(value: string): value is RequirementKind {
  return value === "U" || value === "S" || value === "E" || value === "O" || value === "N";
}

/** First `-X-` kind token in the ID wins; anything else is Ubiquitous. */
export function kindFromId(id: string): RequirementKind {
  const letter = /-([USEON])-/.exec(id)?.[1];
  return letter && isRequirementKind(letter) ? letter : "U";
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
