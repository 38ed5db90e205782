export type RoadmapErrorCode =
  | "invalid_store_file"
  | "store_read_failed"
  | "save_failed"
  | "task_not_found"
  | "invalid_config";

export class RoadmapError extends Error {
  constructor(
    public readonly code: RoadmapErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RoadmapError";
  }
}

export class StoreError extends RoadmapError {
  constructor(code: RoadmapErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message);
    this.name = "StoreError";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
