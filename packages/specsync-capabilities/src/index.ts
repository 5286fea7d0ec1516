import { fileURLToPath } from "node:url";
import fs from "fs-extra";
import { z } from "zod";
import type { CapabilityCatalog, CapabilityEntry } from "@specsync/core";

export const CATALOG_PATH = fileURLToPath(new URL("../data/capabilities.json", import.meta.url));

const TagSchema = z
  .string()
  .min(1)
  .transform(value => value.trim())
  .refine(value => /^[a-z0-9][a-z0-9-]*$/.test(value), { message: "Tags are lower-case kebab-case" });

const CapabilityEntrySchema = z.object({
  tag: TagSchema,
  category: z.string().min(1),
  keywords: z.array(z.string().min(1).transform(value => value.toLowerCase())).min(1),
  description: z.string().default(""),
});

export const CapabilityCatalogSchema = z
  .object({
    coreTags: z.array(TagSchema).default([]),
    limit: z.number().int().positive().default(10),
    capabilities: z.array(CapabilityEntrySchema),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.capabilities.forEach((entry, index) => {
      if (seen.has(entry.tag)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["capabilities", index, "tag"],
          message: `Duplicate capability tag '${entry.tag}'`,
        });
      }
      seen.add(entry.tag);
    });
  });

function freezeEntry(entry: CapabilityEntry): CapabilityEntry {
  return Object.freeze({ ...entry, keywords: Object.freeze([...entry.keywords]) });
}

export function parseCapabilityCatalog(raw: unknown): CapabilityCatalog {
  const parsed = CapabilityCatalogSchema.parse(raw);
  return Object.freeze({
    entries: Object.freeze(parsed.capabilities.map(freezeEntry)),
    coreTags: Object.freeze([...parsed.coreTags]),
    limit: parsed.limit,
  });
}

let builtinCatalog: CapabilityCatalog | undefined;

/** The bundled catalog, read once per process. */
export function loadCapabilityCatalog(): CapabilityCatalog {
  builtinCatalog ??= parseCapabilityCatalog(fs.readJsonSync(CATALOG_PATH));
  return builtinCatalog;
}

export class CapabilityRegistry {
  private readonly items: Map<string, CapabilityEntry>;

  constructor(private readonly catalog: CapabilityCatalog = loadCapabilityCatalog()) {
    this.items = new Map(catalog.entries.map(entry => [entry.tag, entry] as const));
  }

  get(tag: string): CapabilityEntry | undefined {
    return this.items.get(tag);
  }

  has(tag: string): boolean {
    return this.items.has(tag);
  }

  list(): CapabilityEntry[] {
    return Array.from(this.items.values(), entry => ({ ...entry, keywords: [...entry.keywords] }));
  }

  categories(): string[] {
    return Array.from(new Set(this.catalog.entries.map(entry => entry.category)));
  }

  byCategory(category: string): CapabilityEntry[] {
    return this.list().filter(entry => entry.category === category);
  }

  toCatalog(): CapabilityCatalog {
    return this.catalog;
  }
}

export function createCapabilityRegistry(): CapabilityRegistry {
  return new CapabilityRegistry(loadCapabilityCatalog());
}
