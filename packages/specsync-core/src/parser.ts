import fs from "fs-extra";

import { MalformedHeaderError, NotFoundError } from "./errors.js";
import {
  REQUIREMENT_KINDS,
  kindFromId,
  type Requirement,
  type SpecDocument,
} from "./model/SpecDocument.js";

export const HEADER_DELIMITER = "---";
export const CAPABILITIES_FIELD = "related_capabilities";

export const HEADER_DEFAULTS = {
  status: "draft",
  version: "1.0.0",
  author: "Unknown",
  date: "",
} as const;

const FIELD_PATTERN = /^([A-Za-z_][A-Za-z0-9_-]*):[ \t]*(.*)$/;
const LIST_ITEM_PATTERN = /^[ \t]+-[ \t]+(.+)$/;
const PURPOSE_PATTERN = /\*\*Purpose\*\*:[ \t]*(.+)/;
const REQUIREMENT_PATTERN = /-\s+\*\*([A-Z0-9-]+)\*\*:[ \t]*(.*)/g;

export interface HeaderBlock {
  fields: Map<string, string>;
  lists: Map<string, string[]>;
}

export interface SplitDocument {
  header: string[];
  body: string;
}

/**
 * Splits a document into its `---` delimited header lines and the body that
 * follows. Returns null when the text does not open with a header block.
 */
export function splitHeader(text: string): SplitDocument | null {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  let start = 0;
  while (start < lines.length && lines[start].trim() === "") {
    start += 1;
  }
  if (start >= lines.length || lines[start].trimEnd() !== HEADER_DELIMITER) {
    return null;
  }
  for (let end = start + 1; end < lines.length; end += 1) {
    if (lines[end].trimEnd() === HEADER_DELIMITER) {
      return {
        header: lines.slice(start + 1, end),
        body: lines.slice(end + 1).join("\n"),
      };
    }
  }
  return null;
}

export function parseHeaderBlock(lines: readonly string[]): HeaderBlock {
  const fields = new Map<string, string>();
  const lists = new Map<string, string[]>();
  for (let index = 0; index < lines.length; index += 1) {
    const match = FIELD_PATTERN.exec(lines[index]);
    if (!match) continue;
    const [, key, rawValue] = match;
    const value = rawValue.trim();
    if (value) {
      if (!fields.has(key)) fields.set(key, value);
      continue;
    }
    const items: string[] = [];
    while (index + 1 < lines.length) {
      const item = LIST_ITEM_PATTERN.exec(lines[index + 1]);
      if (!item) break;
      items.push(item[1].trim());
      index += 1;
    }
    if (!lists.has(key)) lists.set(key, items);
  }
  return { fields, lists };
}

/** Every requirement ID in document order, duplicates included. */
export function findRequirementIds(body: string): string[] {
  return Array.from(body.matchAll(REQUIREMENT_PATTERN), (match) => match[1]);
}

export function extractRequirements(body: string): Requirement[] {
  const seen = new Set<string>();
  const found: Requirement[] = [];
  for (const match of body.matchAll(REQUIREMENT_PATTERN)) {
    const id = match[1];
    if (seen.has(id)) continue;
    seen.add(id);
    found.push({ id, kind: kindFromId(id), description: match[2].trim() });
  }
  return REQUIREMENT_KINDS.flatMap((kind) => found.filter((requirement) => requirement.kind === kind));
}

export function extractPurpose(body: string): string {
  return PURPOSE_PATTERN.exec(body)?.[1].trim() ?? "";
}

function requireField(fields: Map<string, string>, name: string): string {
  const value = fields.get(name);
  if (!value) {
    throw new MalformedHeaderError(`Header is missing required field '${name}'`, name);
  }
  return value;
}

export function parseSpecDocument(text: string): SpecDocument {
  const split = splitHeader(text);
  if (!split) {
    throw new MalformedHeaderError("No header block found (expected a document opening with '---')");
  }
  const { fields, lists } = parseHeaderBlock(split.header);
  const specId = requireField(fields, "spec_id");
  const feature = requireField(fields, "feature");

  return {
    specId,
    feature,
    status: fields.get("status") ?? HEADER_DEFAULTS.status,
    version: fields.get("version") ?? HEADER_DEFAULTS.version,
    author: fields.get("author") ?? HEADER_DEFAULTS.author,
    date: fields.get("date") ?? HEADER_DEFAULTS.date,
    relatedCapabilities: Array.from(new Set(lists.get(CAPABILITIES_FIELD) ?? [])),
    requirements: extractRequirements(split.body),
    purpose: extractPurpose(split.body),
  };
}

export async function readSpecDocument(specPath: string): Promise<{ text: string; document: SpecDocument }> {
  if (!(await fs.pathExists(specPath))) {
    throw new NotFoundError(specPath, "file");
  }
  const text = await fs.readFile(specPath, "utf8");
  return { text, document: parseSpecDocument(text) };
}
