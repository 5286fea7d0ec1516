import os from "node:os";
import path from "node:path";
import fs from "fs-extra";

import type { CapabilityCatalog, CodeReference, ScanResult } from "../src/model/SpecDocument.js";

export const SAMPLE_SPEC = `---
spec_id: SPEC-001
feature: User Login
status: draft
version: 1.0.0
author: Test Author
date: 2024-01-01
related_capabilities:
  - forms-validation
  - clean-architecture
---

# User Login Specification

## 1. Overview

**Purpose**: Let registered users sign in

## 2. Requirements (EARS Format)

### 2.1 Ubiquitous Requirements (Core Functionality)

- **REQ-001-U-01**: The system shall validate credentials

### 2.3 Event-Driven Requirements

- **REQ-001-E-01**: WHEN [trigger event], the system shall show an error on failure

## 7. Traceability Matrix

| Requirement | Code File | Test File | Status |
|-------------|-----------|-----------|--------|
| REQ-001-U-01 | [TBD] | [TBD] | ⏳ Pending |
| REQ-001-E-01 | [TBD] | [TBD] | ⏳ Pending |

**Legend**: ⏳ Pending | 🟢 Implemented | ✅ Tested | ❌ Failed
`;

export const TEST_CATALOG: CapabilityCatalog = {
  entries: [
    {
      tag: "forms-validation",
      category: "UI",
      keywords: ["form", "input", "validation", "field", "validate"],
      description: "Form input handling and validation",
    },
    {
      tag: "networking",
      category: "Data",
      keywords: ["api", "network", "http", "rest", "endpoint", "retrofit"],
      description: "HTTP clients",
    },
    {
      tag: "authentication",
      category: "Security",
      keywords: ["login", "auth", "password", "sign in"],
      description: "Sign-in flows",
    },
  ],
  coreTags: ["clean-architecture", "mvvm-architecture", "compose-ui"],
  limit: 10,
};

const tempDirs: string[] = [];

export async function makeTempDir(prefix = "specsync-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/** Deletes every directory handed out by `makeTempDir` since the last call. */
export async function removeTempDirs(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.remove(dir)));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    await fs.outputFile(path.join(root, relPath), content, "utf8");
  }
}

export function ref(requirementId: string, filePath: string, inTestFile = false, line = 1): CodeReference {
  return { requirementId, filePath, line, inTestFile };
}

export function scanOf(references: CodeReference[], sourceFiles: string[] = [], testFiles: string[] = []): ScanResult {
  const map = new Map<string, CodeReference[]>();
  for (const reference of references) {
    map.set(reference.requirementId, [...(map.get(reference.requirementId) ?? []), reference]);
  }
  return { references: map, sourceFiles, testFiles, testMethodCount: 0 };
}
