import fs from 'fs-extra';
import * as path from 'node:path';
import { Diagnostics } from './diagnostics.js';
import { ExportAbortError } from './errors.js';

export const DEFAULT_IMAGE_PATTERN = '/uploads/images/[a-zA-Z0-9./_-]+';

/**
 * Options for copying referenced images
 */
export interface AssetOptions {
  /** Root of the export; references starting with "/" are resolved here */
  sourceRoot: string;
  /** Folder the images are copied into */
  resourceDir: string;
  /** Bare image references to pick up in text (regex source) */
  imagePattern?: string;
}

/**
 * Copies each referenced image once and rewrites references as embeds.
 *
 * The record of copied files lives for a whole run and is shared by every
 * document, so an image referenced from several documents is copied once.
 * Calls must not overlap: each copy is awaited before the next lookup.
 */
export class AssetPipeline {
  /** Source file (absolute) -> copied file name */
  readonly record = new Map<string, string>();
  private readonly takenNames = new Set<string>();
  private readonly referencePattern: RegExp;

  constructor(private readonly options: AssetOptions, private readonly diagnostics?: Diagnostics) {
    // Group 1: [img]ref[/img]   Group 2: [img:ref]   Group 3: ![alt](ref)   Group 4: bare reference
    this.referencePattern = new RegExp(
      [
        '\\[img(?:=[^\\]\\n]*)?\\]([^\\[\\n]+?)\\[\\/img\\]',
        '\\[img:([^\\]\\n]+)\\]',
        '!\\[[^\\]\\n]*\\]\\(([^)\\s]+)[^)\\n]*\\)',
        `((?:https?://[^\\s/()\\]]+)?(?:${options.imagePattern ?? DEFAULT_IMAGE_PATTERN}))`
      ].join('|'),
      'gi'
    );
  }

  get copiedCount(): number {
    return this.record.size;
  }

  /**
   * Find the image file a reference points at, or undefined when it is missing.
   * Files outside the export root are never picked up.
   */
  async locate(reference: string, documentDir: string): Promise<string | undefined> {
    // URLs keep only their path
    const cleaned = reference.trim().replace(/^https?:\/\/[^/?#]*/i, '').split(/[?#]/)[0];
    if (cleaned.length === 0) {
      return undefined;
    }

    const candidates = cleaned.startsWith('/')
      ? [path.join(this.options.sourceRoot, cleaned)]
      : [path.resolve(documentDir, cleaned), path.resolve(this.options.sourceRoot, cleaned)];

    for (const candidate of candidates) {
      if (!this.insideSourceRoot(candidate)) {
        continue;
      }
      if ((await fs.pathExists(candidate)) && (await fs.stat(candidate)).isFile()) {
        return candidate;
      }
    }
    return undefined;
  }

  private insideSourceRoot(file: string): boolean {
    const relative = path.relative(path.resolve(this.options.sourceRoot), file);
    return relative.length > 0
      && relative !== '..'
      && !relative.startsWith(`..${path.sep}`)
      && !path.isAbsolute(relative);
  }

  /**
   * Pick a file name in the resource folder that no other source has taken
   */
  private claimName(sourceFile: string): string {
    const ext = path.extname(sourceFile);
    const stem = path.basename(sourceFile, ext);
    let name = `${stem}${ext}`;
    let n = 2;
    while (this.takenNames.has(name.toLowerCase())) {
      name = `${stem}-${n}${ext}`;
      n++;
    }
    this.takenNames.add(name.toLowerCase());
    return name;
  }

  /**
   * Return the embed for an image reference, copying the image on first use.
   * A missing image gives back `original` unchanged and a warning.
   * Failing to write into the resource folder aborts the run.
   */
  async embed(reference: string, documentDir: string, original: string = reference): Promise<string> {
    const sourceFile = await this.locate(reference, documentDir);
    if (!sourceFile) {
      this.diagnostics?.warn('missing-asset', `Image not found: ${reference}`);
      return original;
    }

    let name = this.record.get(sourceFile);
    if (name === undefined) {
      name = this.claimName(sourceFile);
      try {
        await fs.ensureDir(this.options.resourceDir);
      } catch (err) {
        throw new ExportAbortError(this.options.resourceDir, err);
      }
      const target = path.join(this.options.resourceDir, name);
      try {
        await fs.copy(sourceFile, target);
      } catch (err) {
        throw new ExportAbortError(target, err);
      }
      this.record.set(sourceFile, name);
    }
    return `![[${name}]]`;
  }

  /**
   * Rewrite the image references in a text as embeds
   */
  async rewriteImages(text: string, documentDir: string): Promise<string> {
    const pattern = new RegExp(this.referencePattern.source, 'gi');
    let out = '';
    let cursor = 0;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      if (match[0].length === 0) {
        pattern.lastIndex++;
        continue;
      }
      const reference = match[1] ?? match[2] ?? match[3] ?? match[4];
      out += text.slice(cursor, match.index);
      out += reference === undefined ? match[0] : await this.embed(reference, documentDir, match[0]);
      cursor = match.index + match[0].length;
    }

    return out + text.slice(cursor);
  }
}
