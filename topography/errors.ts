export type PipelineErrorKind =
  | "InputMissing"
  | "MalformedRow"
  | "MarkerMissing"
  | "ParseNumeric"
  | "NonFinite"
  | "IoWrite"
  | "OutputDirUncreatable"
  | "WorkerPanic"
  | "ColumnMissing"
  | "ShapeMismatch";

/** Kinds that abort the whole batch instead of a single unit of work. */
const FATAL_KINDS: ReadonlySet<PipelineErrorKind> = new Set(["OutputDirUncreatable"]);

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly path: string | undefined;

  constructor(kind: PipelineErrorKind, message: string, opts: { path?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.path = opts.path;
  }

  get fatal(): boolean {
    return FATAL_KINDS.has(this.kind);
  }
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/**
 * Normalizes anything thrown at a task boundary. Errors that are not already
 * tagged become `WorkerPanic`.
 */
export function classify(e: unknown, path?: string): PipelineError {
  if (isPipelineError(e)) {
    if (e.path !== undefined || path === undefined) return e;
    return new PipelineError(e.kind, e.message, { path, cause: e.cause });
  }
  return new PipelineError("WorkerPanic", errorMessage(e), { path, cause: e });
}

/** One stderr-ready line: `[Kind] path: message`. */
export function formatError(e: PipelineError): string {
  const where = e.path ? `${e.path}: ` : "";
  return `[${e.kind}] ${where}${e.message}`;
}
