// ---------------------------------------------------------------------------
// Dock errors
// ---------------------------------------------------------------------------

/** A scratch file or launcher file could not be created, copied, read or removed. */
export class DockIOError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DockIOError";
    this.path = filePath;
  }
}

/** An operation was attempted on an entry that lacks its preconditions. */
export class DockStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DockStateError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
