import path from "node:path";
import fs from "fs-extra";
import { globby } from "globby";

import { matchCapabilities } from "./matcher.js";
import {
  REQUIREMENT_KINDS,
  compareIds,
  type CapabilityCatalog,
  type Requirement,
  type RequirementKind,
  type SpecDocument,
} from "./model/SpecDocument.js";
import { CAPABILITIES_FIELD, HEADER_DEFAULTS } from "./parser.js";
import { MATRIX_HEADER, MATRIX_HEADING, MATRIX_SEPARATOR, MATRIX_STATUS } from "./writers/matrix.js";

export const SPEC_FILE_NAME = "SPEC.md";
export const SPEC_ID_PREFIX = "SPEC-";
const SPEC_ID_PATTERN = /spec_id:\s*SPEC-(\d+)/;

interface EarsRule {
  kind: RequirementKind;
  keywords: readonly string[];
  lead: string;
  wrap: (text: string) => string;
}

// Checked in this order; the first rule with a keyword hit wins.
const EARS_RULES: readonly EarsRule[] = [
  {
    kind: "E",
    keywords: ["when", "on click", "on tap", "trigger", "event"],
    lead: "WHEN",
    wrap: (text) => `WHEN [trigger event], the system shall ${text}`,
  },
  {
    kind: "S",
    keywords: ["while", "during", "in state"],
    lead: "WHILE",
    wrap: (text) => `WHILE [in specific state], the system shall ${text}`,
  },
  {
    kind: "N",
    keywords: ["shall not", "must not", "cannot", "should not"],
    lead: "IF",
    wrap: (text) => `IF [condition], THEN the system shall NOT ${text}`,
  },
  {
    kind: "O",
    keywords: ["optional", "if enabled", "where available"],
    lead: "WHERE",
    wrap: (text) => `WHERE [feature is enabled], the system shall ${text}`,
  },
];

const UBIQUITOUS_LEAD = "The system shall";

export const KIND_SECTIONS: Record<RequirementKind, { title: string; format: string }> = {
  U: { title: "Ubiquitous Requirements (Core Functionality)", format: "The system shall [requirement]" },
  S: { title: "State-Driven Requirements", format: "WHILE [state], the system shall [requirement]" },
  E: { title: "Event-Driven Requirements", format: "WHEN [trigger event], the system shall [requirement]" },
  O: { title: "Optional Requirements", format: "WHERE [feature is enabled], the system shall [requirement]" },
  N: { title: "Unwanted Behaviors", format: "IF [condition], THEN the system shall NOT [unwanted behavior]" },
};

export interface CategorizedRequirement {
  kind: RequirementKind;
  text: string;
}

export function categorizeRequirement(requirement: string): CategorizedRequirement {
  const text = requirement.trim();
  const lower = text.toLowerCase();
  for (const rule of EARS_RULES) {
    if (rule.keywords.some((keyword) => lower.includes(keyword))) {
      return { kind: rule.kind, text: text.startsWith(rule.lead) ? text : rule.wrap(text) };
    }
  }
  return { kind: "U", text: text.startsWith(UBIQUITOUS_LEAD) ? text : `${UBIQUITOUS_LEAD} ${text}` };
}

export function specKey(specId: string): string {
  return specId.startsWith(SPEC_ID_PREFIX) ? specId.slice(SPEC_ID_PREFIX.length) : specId;
}

export function requirementId(specId: string, kind: RequirementKind, index: number): string {
  return `REQ-${specKey(specId)}-${kind}-${String(index).padStart(2, "0")}`;
}

export function formatSpecId(value: number): string {
  return `${SPEC_ID_PREFIX}${String(value).padStart(3, "0")}`;
}

export function featureSlug(feature: string): string {
  return feature.trim().toLowerCase().replace(/\s+/g, "-");
}

export interface ComposeInput {
  specId: string;
  feature: string;
  purpose?: string;
  requirements: readonly string[];
  author?: string;
  /** `YYYY-MM-DD`; defaults to today. */
  date?: string;
}

export function today(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function composeSpecDocument(input: ComposeInput, catalog: CapabilityCatalog): SpecDocument {
  const raw = input.requirements.map((item) => item.trim()).filter((item) => item.length > 0);
  const byKind = new Map<RequirementKind, string[]>();
  for (const item of raw) {
    const { kind, text } = categorizeRequirement(item);
    byKind.set(kind, [...(byKind.get(kind) ?? []), text]);
  }

  const requirements: Requirement[] = REQUIREMENT_KINDS.flatMap((kind) =>
    (byKind.get(kind) ?? []).map((description, index) => ({
      id: requirementId(input.specId, kind, index + 1),
      kind,
      description,
    }))
  );

  return {
    specId: input.specId,
    feature: input.feature.trim(),
    status: HEADER_DEFAULTS.status,
    version: HEADER_DEFAULTS.version,
    author: input.author ?? HEADER_DEFAULTS.author,
    date: input.date ?? today(),
    relatedCapabilities: matchCapabilities(input.feature, raw, catalog),
    requirements,
    purpose: input.purpose?.trim() ?? "",
  };
}

function renderRequirementSections(requirements: readonly Requirement[]): string[] {
  const lines: string[] = [];
  REQUIREMENT_KINDS.forEach((kind, index) => {
    const group = requirements.filter((requirement) => requirement.kind === kind);
    if (group.length === 0) return;
    const section = KIND_SECTIONS[kind];
    lines.push(
      `### 2.${index + 1} ${section.title}`,
      `*Format: "${section.format}"*`,
      "",
      ...group.map((requirement) => `- **${requirement.id}**: ${requirement.description}`),
      ""
    );
  });
  return lines;
}

const USER_STORIES = [
  "## 3. User Stories",
  "",
  "### Story 1: [User Story Title]",
  "**As a** [user type]",
  "**I want** [goal/desire]",
  "**So that** [benefit/value]",
  "",
  "**Acceptance Criteria**:",
  "- [ ] Given [precondition], when [action], then [expected result]",
  "",
  "**Related Requirements**: [REQ IDs]",
];

const ARCHITECTURE_OUTLINE = [
  "## 4. Architecture (Clean Architecture)",
  "",
  "### 4.1 Domain Layer",
  "",
  "**Models**: [Entities derived from the requirements]",
  "",
  "**Use Cases**:",
  "- `Get[Entity]UseCase`: [Description]",
  "",
  "**Repository Interfaces**: [Data access contracts]",
  "",
  "### 4.2 Data Layer",
  "",
  "**API Endpoints**:",
  "- `GET /api/[endpoint]`: [Description]",
  "",
  "### 4.3 Presentation Layer",
  "",
  "**Screens**:",
  "- `[Feature]Screen`: [Description]",
];

const CHECKLIST = [
  "## 6. Implementation Checklist",
  "",
  "### Domain Layer",
  "- [ ] Define domain models",
  "- [ ] Create use cases",
  "- [ ] Define repository interfaces",
  "",
  "### Data Layer",
  "- [ ] Implement API service",
  "- [ ] Implement repository",
  "",
  "### Presentation Layer",
  "- [ ] Create ViewModel",
  "- [ ] Define State, Actions, Events",
  "- [ ] Implement UI screens",
  "",
  "### Testing",
  "- [ ] Write unit tests",
  "- [ ] Write UI tests",
  "",
  "### Documentation",
  "- [ ] Add code comments with requirement IDs",
  "- [ ] Run `specsync sync` to refresh the matrix and README",
];

export const MATRIX_LEGEND = `**Legend**: ${Object.values(MATRIX_STATUS).join(" | ")}`;

/** Renders a new document; `parseSpecDocument` reads back the same ID, feature and requirements. */
export function renderSpecDocument(document: SpecDocument, catalog?: CapabilityCatalog): string {
  const descriptions = new Map(catalog?.entries.map((entry) => [entry.tag, entry.description]) ?? []);
  const lines: string[] = [
    "---",
    `spec_id: ${document.specId}`,
    `feature: ${document.feature}`,
    `status: ${document.status}`,
    `version: ${document.version}`,
    `author: ${document.author}`,
    `date: ${document.date}`,
    `${CAPABILITIES_FIELD}:`,
    ...document.relatedCapabilities.map((tag) => `  - ${tag}`),
    "---",
    "",
    `# ${document.feature} Specification`,
    "",
    "## 1. Overview",
    "",
    `**Purpose**: ${document.purpose || "[To be defined]"}`,
    "",
    "**Scope**:",
    "- In Scope: [To be defined]",
    "- Out of Scope: [To be defined]",
    "",
    "---",
    "",
    "## 2. Requirements (EARS Format)",
    "",
    ...renderRequirementSections(document.requirements),
    "---",
    "",
    ...USER_STORIES,
    "",
    "---",
    "",
    ...ARCHITECTURE_OUTLINE,
    "",
    "---",
    "",
    "## 5. Related Capabilities",
    "",
    "This feature uses the following capabilities:",
    "",
    ...document.relatedCapabilities.map((tag) => {
      const description = descriptions.get(tag);
      return description ? `- \`${tag}\`: ${description}` : `- \`${tag}\``;
    }),
    "",
    "---",
    "",
    ...CHECKLIST,
    "",
    "---",
    "",
    MATRIX_HEADING,
    "",
    MATRIX_HEADER,
    MATRIX_SEPARATOR,
    ...document.requirements.map((requirement) => `| ${requirement.id} | [TBD] | [TBD] | ${MATRIX_STATUS.pending} |`),
    "",
    MATRIX_LEGEND,
    "",
    "---",
    "",
    "## 8. Notes & Considerations",
    "",
    "### Questions to Resolve",
    "- [Question 1]",
    "",
    "---",
    "",
    `**Document Version**: ${document.version}`,
    `**Last Updated**: ${document.date}`,
    "",
  ];
  return lines.join("\n");
}

export async function listSpecFiles(specsDir: string): Promise<string[]> {
  if (!(await fs.pathExists(specsDir))) return [];
  const files = await globby(`**/${SPEC_FILE_NAME}`, {
    cwd: specsDir,
    onlyFiles: true,
    ignore: ["**/node_modules/**"],
  });
  return files.sort(compareIds).map((file) => path.join(specsDir, file));
}

/** One above the highest `spec_id: SPEC-NNN` found under `specsDir`; `SPEC-001` when there is none. */
export async function nextSpecId(specsDir: string): Promise<string> {
  let highest = 0;
  for (const file of await listSpecFiles(specsDir)) {
    const match = SPEC_ID_PATTERN.exec(await fs.readFile(file, "utf8"));
    if (match) {
      highest = Math.max(highest, Number.parseInt(match[1], 10));
    }
  }
  return formatSpecId(highest + 1);
}
