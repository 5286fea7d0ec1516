export type SpecSyncErrorCode = "MALFORMED_HEADER" | "MISSING_ANCHOR" | "NOT_FOUND";

export class SpecSyncError extends Error {
  constructor(
    message: string,
    public readonly code: SpecSyncErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "SpecSyncError";
  }
}

/** Header block absent, or `spec_id` / `feature` missing. Aborts parsing. */
export class MalformedHeaderError extends SpecSyncError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, "MALFORMED_HEADER");
    this.name = "MalformedHeaderError";
  }
}

/** An expected structural marker is absent; only the affected step is skipped. */
export class MissingAnchorError extends SpecSyncError {
  constructor(
    message: string,
    public readonly anchor: string
  ) {
    super(message, "MISSING_ANCHOR");
    this.name = "MissingAnchorError";
  }
}

export class NotFoundError extends SpecSyncError {
  constructor(
    public readonly targetPath: string,
    public readonly kind: "file" | "directory"
  ) {
    super(`${kind === "file" ? "File" : "Directory"} not found: ${targetPath}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}
