import { Logger } from './logger.js';

/**
 * Data-quality conditions that are recovered locally and never stop a run
 */
export type WarningKind =
  | 'malformed-markup'
  | 'unresolved-reference'
  | 'missing-asset'
  | 'title-collision'
  | 'duplicate-id';

export interface ConversionWarning {
  kind: WarningKind;
  message: string;
  /** The document being converted when the warning was raised */
  documentId?: string;
}

/**
 * Collects warnings for a run and forwards each one to the logger.
 */
export class Diagnostics {
  readonly warnings: ConversionWarning[] = [];
  private documentId: string | undefined;

  constructor(private readonly logger?: Logger) {}

  /**
   * Attribute subsequent warnings to a document (undefined to clear)
   */
  setDocument(documentId: string | undefined): void {
    this.documentId = documentId;
  }

  warn(kind: WarningKind, message: string): void {
    const warning: ConversionWarning = { kind, message };
    if (this.documentId !== undefined) {
      warning.documentId = this.documentId;
    }
    this.warnings.push(warning);
    const prefix = this.documentId !== undefined ? `[${this.documentId}] ` : '';
    this.logger?.warn(`${prefix}${kind}: ${message}`);
  }

  count(kind: WarningKind): number {
    return this.warnings.filter(w => w.kind === kind).length;
  }

  countsByKind(): Record<WarningKind, number> {
    return {
      'malformed-markup': this.count('malformed-markup'),
      'unresolved-reference': this.count('unresolved-reference'),
      'missing-asset': this.count('missing-asset'),
      'title-collision': this.count('title-collision'),
      'duplicate-id': this.count('duplicate-id')
    };
  }
}
