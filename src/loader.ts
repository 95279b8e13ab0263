import fs from 'fs-extra';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DocumentRelation, DocumentSection, RelationItem, SourceDocument } from './types.js';
import { describeError, ExportAbortError } from './errors.js';
import { isRecord } from './metadata-mapper.js';

/**
 * A source file that could not be turned into a document
 */
export interface LoadFailure {
  sourcePath: string;
  reason: string;
}

/**
 * Result of loading the whole export
 */
export interface LoadResult {
  /** Documents in traversal order (sorted paths, depth first) */
  documents: SourceDocument[];
  /** Files skipped because they could not be parsed */
  failures: LoadFailure[];
}

const articleSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
    title: z.string().nullish(),
    template: z.string().nullish(),
    content: z.string().nullish(),
    images: z.array(z.string()).nullish(),
    cover: z.union([z.string(), z.object({ url: z.string() }).passthrough()]).nullish(),
    sections: z.record(z.unknown()).nullish(),
    relations: z.record(z.unknown()).nullish()
  })
  .passthrough();

/**
 * Find all export files under a directory, sorted so traversal order is
 * the same on every run
 */
async function findExportFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new ExportAbortError(dir, err);
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...await findExportFiles(fullPath));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.json')) {
      files.push(fullPath);
    }
  }
  return files;
}

function readSections(raw: Record<string, unknown> | null | undefined): DocumentSection[] {
  const sections: DocumentSection[] = [];
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (isRecord(value) && typeof value.content === 'string' && value.content.trim().length > 0) {
      sections.push({ key, content: value.content });
    }
  }
  return sections;
}

function readRelationItem(raw: unknown): RelationItem | null {
  if (!isRecord(raw) || typeof raw.title !== 'string' || raw.title.length === 0) {
    return null;
  }
  const item: RelationItem = {
    title: raw.title,
    relationshipType: typeof raw.relationshipType === 'string' ? raw.relationshipType : ''
  };
  if (typeof raw.id === 'string' || typeof raw.id === 'number') {
    item.id = String(raw.id);
  }
  return item;
}

function readRelations(raw: Record<string, unknown> | null | undefined): DocumentRelation[] {
  const relations: DocumentRelation[] = [];
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (!isRecord(value)) {
      continue;
    }
    const rawItems = Array.isArray(value.items) ? value.items : [value.items];
    const items = rawItems
      .map(readRelationItem)
      .filter((item): item is RelationItem => item !== null);
    if (items.length > 0) {
      relations.push({ key, items });
    }
  }
  return relations;
}

/**
 * Turn one parsed export file into a document
 *
 * @param sourcePath - path relative to the export root, `/`-separated
 */
export function toSourceDocument(raw: unknown, sourcePath: string): SourceDocument {
  const article = articleSchema.parse(raw);
  const stem = path.posix.basename(sourcePath, path.posix.extname(sourcePath));

  const images = [...(article.images ?? [])];
  if (typeof article.cover === 'string') {
    images.unshift(article.cover);
  } else if (article.cover) {
    images.unshift(article.cover.url);
  }

  return {
    id: article.id ?? sourcePath.replace(/\.json$/i, ''),
    title: article.title?.trim() || stem,
    category: article.template?.trim() || 'other',
    body: (article.content ?? '').replace(/\r\n?/g, '\n'),
    images,
    sourcePath,
    attributes: article,
    sections: readSections(article.sections),
    relations: readRelations(article.relations)
  };
}

/**
 * Load every export file under the source directory.
 * Unparseable files are recorded and skipped; an unreadable directory
 * aborts the run.
 */
export async function loadExport(sourceDir: string): Promise<LoadResult> {
  const documents: SourceDocument[] = [];
  const failures: LoadFailure[] = [];

  for (const filePath of await findExportFiles(sourceDir)) {
    const sourcePath = path.relative(sourceDir, filePath).split(path.sep).join('/');

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (err) {
      failures.push({ sourcePath, reason: `Could not read JSON: ${describeError(err)}` });
      continue;
    }

    try {
      documents.push(toSourceDocument(raw, sourcePath));
    } catch (err) {
      const reason = err instanceof z.ZodError
        ? err.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
        : describeError(err);
      failures.push({ sourcePath, reason });
    }
  }

  return { documents, failures };
}
