export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * A single document could not be converted. The walker skips it and moves on.
 */
export class DocumentConversionError extends Error {
  constructor(public readonly documentId: string, cause: unknown) {
    super(`Failed to convert document ${documentId}: ${describeError(cause)}`, { cause });
    this.name = 'DocumentConversionError';
  }
}

/**
 * The whole run cannot continue (source unreadable, destination unwritable).
 */
export class ExportAbortError extends Error {
  constructor(public readonly path: string, cause: unknown) {
    super(`Export aborted at ${path}: ${describeError(cause)}`, { cause });
    this.name = 'ExportAbortError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
