import { describe, expect, it } from "vitest";
import { matchCapabilities } from "@specsync/core";

import {
  CapabilityRegistry,
  createCapabilityRegistry,
  loadCapabilityCatalog,
  parseCapabilityCatalog,
} from "../src/index.js";

describe("bundled capability catalog", () => {
  const catalog = loadCapabilityCatalog();

  it("loads with core tags that exist in the catalog", () => {
    const registry = new CapabilityRegistry(catalog);
    expect(catalog.limit).toBe(10);
    expect(catalog.coreTags).toEqual(["clean-architecture", "mvvm-architecture", "compose-ui"]);
    for (const tag of catalog.coreTags) {
      expect(registry.has(tag)).toBe(true);
    }
  });

  it("is cached and frozen", () => {
    expect(loadCapabilityCatalog()).toBe(catalog);
    expect(Object.isFrozen(catalog.entries)).toBe(true);
  });

  it("ranks forms-validation for a login form and never pulls in networking", () => {
    const result = matchCapabilities("user login form with validation", [], catalog);
    expect(result[0]).toBe("forms-validation");
    expect(result).not.toContain("networking");
    expect(result.slice(-3)).toEqual(["clean-architecture", "mvvm-architecture", "compose-ui"]);
  });
});

describe("parseCapabilityCatalog", () => {
  it("applies defaults and lower-cases keywords", () => {
    const catalog = parseCapabilityCatalog({
      capabilities: [{ tag: "search", category: "Data", keywords: ["Query", "Filter"] }],
    });
    expect(catalog.limit).toBe(10);
    expect(catalog.coreTags).toEqual([]);
    expect(catalog.entries).toEqual([{ tag: "search", category: "Data", keywords: ["query", "filter"], description: "" }]);
  });

  it("rejects duplicate tags", () => {
    expect(() =>
      parseCapabilityCatalog({
        capabilities: [
          { tag: "search", category: "Data", keywords: ["query"] },
          { tag: "search", category: "UI", keywords: ["filter"] },
        ],
      })
    ).toThrow(/Duplicate capability tag 'search'/);
  });

  it("rejects entries without keywords", () => {
    expect(() => parseCapabilityCatalog({ capabilities: [{ tag: "empty", category: "x", keywords: [] }] })).toThrow();
  });
});

describe("CapabilityRegistry", () => {
  it("groups entries by category", () => {
    const registry = createCapabilityRegistry();
    expect(registry.categories()).toContain("Testing");
    expect(registry.byCategory("DI").map(entry => entry.tag)).toEqual(["hilt-di", "koin-di"]);
    expect(registry.get("networking")?.keywords).toContain("retrofit");
  });
});
