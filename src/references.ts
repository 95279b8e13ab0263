import { IndexEntry, ReferenceIndex, RelationItem, SourceDocument } from './types.js';
import { Diagnostics } from './diagnostics.js';

/**
 * An in-text reference to another document, by identifier
 * ("@[Dragon's Lair](location:42)", "@[Dragon's Lair](42)") or by title
 * ("@[Dragon's Lair]")
 * Group 1: label
 * Group 2: target, "type:id" or a bare id (absent for title references)
 */
export const REFERENCE_PATTERN = /@\[([^\]\n]+)\](?:\(([^)\n]*)\))?/;

/**
 * Options that decide where documents land in the destination tree
 */
export interface IndexOptions {
  /** Put every document directly in the destination root */
  flattenFolders?: boolean;
  /** Folder name per category; unmapped categories use the category itself */
  folderNames?: Record<string, string>;
}

/**
 * Normalize a title for lookups: accents and punctuation dropped,
 * lowercased, whitespace collapsed.
 * "Dragon's  Lair" -> "dragons lair"
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Turn a title into a file name stem: "Dragon's Lair" -> "Dragons-Lair"
 */
export function slugifyTitle(title: string): string {
  return title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .trim()
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-');
}

/**
 * Make a category usable as a folder name: path separators, wiki-link
 * metacharacters and leading dots are dropped
 */
function sanitizeFolder(name: string): string {
  return name
    .replace(/[\\/:*?"<>|#^[\]]/g, '')
    .trim()
    .replace(/^\.+/, '')
    .trim();
}

function destinationFolder(category: string, options: IndexOptions): string {
  if (options.flattenFolders) {
    return '';
  }
  return sanitizeFolder(options.folderNames?.[category] ?? category);
}

/**
 * Claim a destination path, adding "-2", "-3", ... when it is already taken
 */
function claimPath(folder: string, stem: string, taken: Set<string>): string {
  const prefix = folder.length > 0 ? `${folder}/` : '';
  let candidate = `${prefix}${stem}.md`;
  let n = 2;
  while (taken.has(candidate.toLowerCase())) {
    candidate = `${prefix}${stem}-${n}.md`;
    n++;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Build the reference index from every document of the export.
 *
 * Documents are taken in traversal order, and that order settles every tie:
 * - a repeated identifier keeps its first document
 * - the first document wins a normalized-title collision, later ones are
 *   still reachable by identifier
 * - colliding destination paths get a numeric suffix
 * Collisions and duplicates are recorded and reported to `diagnostics`.
 */
export function buildReferenceIndex(
  documents: SourceDocument[],
  options: IndexOptions = {},
  diagnostics?: Diagnostics
): ReferenceIndex {
  const index: ReferenceIndex = {
    byId: new Map(),
    byTitle: new Map(),
    entries: [],
    collisions: [],
    duplicateIds: []
  };
  const takenPaths = new Set<string>();

  for (const doc of documents) {
    if (index.byId.has(doc.id)) {
      index.duplicateIds.push(doc.id);
      diagnostics?.warn('duplicate-id', `Identifier ${doc.id} (${doc.sourcePath}) is already used; keeping the first document`);
      continue;
    }

    const stem = slugifyTitle(doc.title) || slugifyTitle(doc.id) || 'untitled';
    const path = claimPath(destinationFolder(doc.category, options), stem, takenPaths);
    const entry: IndexEntry = {
      id: doc.id,
      title: doc.title,
      category: doc.category,
      sourcePath: doc.sourcePath,
      path,
      linkTarget: path.slice(0, -'.md'.length)
    };

    index.entries.push(entry);
    index.byId.set(entry.id, entry);

    const normalized = normalizeTitle(doc.title);
    if (normalized.length === 0) {
      continue;
    }
    const winner = index.byTitle.get(normalized);
    if (winner) {
      index.collisions.push({ normalizedTitle: normalized, winnerId: winner.id, shadowedId: entry.id });
      diagnostics?.warn(
        'title-collision',
        `"${doc.title}" (${entry.id}) normalizes like "${winner.title}" (${winner.id}); title lookups resolve to ${winner.id}`
      );
    } else {
      index.byTitle.set(normalized, entry);
    }
  }

  return index;
}

/**
 * Find a document by exact identifier when the reference carries one,
 * by normalized title otherwise. A reference whose identifier is missing
 * from the index stays unresolved even if its label names another document.
 */
export function lookupReference(index: ReferenceIndex, id: string | undefined, title: string): IndexEntry | undefined {
  if (id !== undefined && id.length > 0) {
    return index.byId.get(id);
  }
  return index.byTitle.get(normalizeTitle(title));
}

/**
 * Wiki-link to an indexed document: [[Locations/Dragons-Lair|Dragon's Lair]]
 */
export function formatWikiLink(entry: IndexEntry): string {
  const label = entry.title.replace(/[[\]]/g, '').replace(/\|/g, '-');
  return `[[${entry.linkTarget}|${label}]]`;
}

/**
 * Identifier part of a reference target ("location:42" -> "42")
 */
function targetId(target: string | undefined): string | undefined {
  if (target === undefined) {
    return undefined;
  }
  const id = target.slice(target.lastIndexOf(':') + 1).trim();
  return id.length > 0 ? id : undefined;
}

export interface UnresolvedReference {
  label: string;
  /** Absent for title references */
  target?: string;
}

export interface ResolveResult {
  text: string;
  resolved: number;
  unresolved: UnresolvedReference[];
}

/**
 * Rewrite every "@[label](target)" reference as a wiki-link. The link shows
 * the target document's display title. References to documents missing from
 * the index become their plain label.
 *
 * Depends only on the text and the index.
 */
export function resolveReferences(text: string, index: ReferenceIndex): ResolveResult {
  const unresolved: UnresolvedReference[] = [];
  let resolved = 0;

  const rewritten = text.replace(new RegExp(REFERENCE_PATTERN.source, 'g'), (_match, label: string, target: string | undefined) => {
    const entry = lookupReference(index, targetId(target), label);
    if (entry) {
      resolved++;
      return formatWikiLink(entry);
    }
    unresolved.push(target === undefined ? { label } : { label, target });
    return label;
  });

  return { text: rewritten, resolved, unresolved };
}

/**
 * Render one relation item: a wiki-link when the item resolves, its plain
 * title otherwise
 */
export function resolveRelationItem(item: RelationItem, index: ReferenceIndex): { text: string; resolved: boolean } {
  const entry = lookupReference(index, item.id, item.title);
  if (entry) {
    return { text: formatWikiLink(entry), resolved: true };
  }
  return { text: item.title, resolved: false };
}
