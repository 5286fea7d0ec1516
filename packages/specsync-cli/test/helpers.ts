import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import fs from "fs-extra";
import { Cli } from "clipanion";
import stripAnsi from "strip-ansi";
import { createCli } from "../src/index.js";

class Capture extends Writable {
  text = "";

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

export interface CliRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export async function runCli(args: string[]): Promise<CliRun> {
  const stdout = new Capture();
  const stderr = new Capture();
  const exitCode = await createCli().run(args, { ...Cli.defaultContext, stdout, stderr });
  return { exitCode, stdout: stripAnsi(stdout.text), stderr: stripAnsi(stderr.text) };
}

const projects: string[] = [];

export async function makeProject(files: Record<string, string> = {}): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "specsync-cli-"));
  projects.push(root);
  for (const [relPath, content] of Object.entries(files)) {
    await fs.outputFile(path.join(root, relPath), content, "utf8");
  }
  return root;
}

export async function removeProjects(): Promise<void> {
  await Promise.all(projects.splice(0).map(root => fs.remove(root)));
}

export const LOGIN_SPEC = `---
spec_id: SPEC-001
feature: User Login
status: draft
version: 1.0.0
related_capabilities:
  - authentication
---

# User Login Specification

## 1. Overview

**Purpose**: Let registered users sign in

## 2. Requirements (EARS Format)

- **REQ-001-U-01**: The system shall validate credentials
- **REQ-001-E-01**: WHEN login fails, the system shall show an error

## 7. Traceability Matrix

| Requirement | Code File | Test File | Status |
|-------------|-----------|-----------|--------|
| REQ-001-U-01 | [TBD] | [TBD] | ⏳ Pending |
| REQ-001-E-01 | [TBD] | [TBD] | ⏳ Pending |
`;
