export type IoOperation = "read" | "write";

export class StatementIoError extends Error {
  readonly operation: IoOperation;
  readonly path: string;

  constructor(operation: IoOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = "StatementIoError";
    this.operation = operation;
    this.path = path;
  }
}
