import type { SyncReport } from "../model/SpecDocument.js";
import { sortedIds } from "../traceability.js";
import { GENERATED_FOOTER } from "./status.js";

export const ARCHITECTURE_FILE_NAME = "architecture.md";

export const LAYERS = [
  { title: "Presentation Layer", marker: "/presentation/" },
  { title: "Domain Layer", marker: "/domain/" },
  { title: "Data Layer", marker: "/data/" },
] as const;

export type LayerTitle = (typeof LAYERS)[number]["title"];

const LAYER_DIAGRAM = [
  "```",
  "┌──────────────────────────────────────────────────────┐",
  "│                 Presentation Layer                   │",
  "│  ┌──────────────┐  ┌───────────────────────────┐     │",
  "│  │   Screen     │  │       ViewModel           │     │",
  "│  │  (Compose)   │←→│  (State Management)       │     │",
  "│  └──────────────┘  └───────────────────────────┘     │",
  "└──────────────────────────┬───────────────────────────┘",
  "                           │",
  "                           ↓",
  "┌──────────────────────────────────────────────────────┐",
  "│                    Domain Layer                      │",
  "│  ┌──────────────┐  ┌───────────────────────────┐     │",
  "│  │   Models     │  │       Use Cases           │     │",
  "│  │  (Business)  │  │  (Business Logic)         │     │",
  "│  └──────────────┘  └───────────────────────────┘     │",
  "│  ┌────────────────────────────────────────────────┐  │",
  "│  │        Repository Interfaces                   │  │",
  "│  │        (Data Access Contracts)                 │  │",
  "│  └────────────────────────────────────────────────┘  │",
  "└──────────────────────────┬───────────────────────────┘",
  "                           │",
  "                           ↓",
  "┌──────────────────────────────────────────────────────┐",
  "│                    Data Layer                        │",
  "│  ┌──────────────┐  ┌───────────────────────────┐     │",
  "│  │  API/DAO     │  │ Repository Implementation │     │",
  "│  │ (Data Source)│  │   (Data Access Logic)     │     │",
  "│  └──────────────┘  └───────────────────────────┘     │",
  "│  ┌────────────────────────────────────────────────┐  │",
  "│  │              DTOs / Entities                   │  │",
  "│  │         (Data Transfer Objects)                │  │",
  "│  └────────────────────────────────────────────────┘  │",
  "└──────────────────────────────────────────────────────┘",
  "```",
];

const DEPENDENCY_FLOW = [
  "## Dependency Flow",
  "",
  "```",
  "Presentation → Domain → Data",
  "     ↓           ↓        ↓",
  " ViewModel → UseCase → Repository",
  "```",
  "",
  "**Key Principle**: Dependencies point inward. Outer layers depend on inner layers, never the reverse.",
];

/** Paths are tested with a leading `/` so a root-level `domain/` directory also counts. */
export function filesInLayer(files: readonly string[], marker: string): string[] {
  return sortedIds(files).filter((file) => `/${file}`.includes(marker));
}

export function partitionByLayer(files: readonly string[]): Map<LayerTitle, string[]> {
  const layers = new Map<LayerTitle, string[]>();
  for (const layer of LAYERS) {
    layers.set(layer.title, filesInLayer(files, layer.marker));
  }
  return layers;
}

export function renderArchitectureDocument(report: Pick<SyncReport, "feature" | "sourceFiles">): string {
  const lines: string[] = [
    `# ${report.feature} - Architecture`,
    "",
    "## Clean Architecture Layers",
    "",
    ...LAYER_DIAGRAM,
    "",
    "## Component Breakdown",
  ];
  for (const [title, files] of partitionByLayer(report.sourceFiles)) {
    lines.push("", `### ${title}`, "", ...files.map((file) => `- \`${file}\``));
  }
  lines.push("", ...DEPENDENCY_FLOW, "", "---", "", GENERATED_FOOTER, "");
  return lines.join("\n");
}
