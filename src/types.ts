/**
 * One exported article, as loaded from the source tree.
 * Immutable once loaded.
 */
export interface SourceDocument {
  /** The export's internal identifier */
  id: string;

  /** Display title */
  title: string;

  /** Document type (the export's template, e.g. "location") */
  category: string;

  /** Raw body text, still carrying embedded tags and BBCode */
  body: string;

  /** Raw attached image references, as written in the export */
  images: string[];

  /** Source file path relative to the source root, `/`-separated */
  sourcePath: string;

  /** The raw parsed export object, for `@path` field lookups */
  attributes: Record<string, unknown>;

  /** Extra named text sections, in export order */
  sections: DocumentSection[];

  /** Named relation groups, in export order */
  relations: DocumentRelation[];
}

/**
 * A named extra text section of a document
 */
export interface DocumentSection {
  key: string;
  content: string;
}

/**
 * A single item of a relation group
 */
export interface RelationItem {
  id?: string;
  title: string;
  /** The export's relationship type; "article" items are linkable */
  relationshipType: string;
}

/**
 * A named group of related items
 */
export interface DocumentRelation {
  key: string;
  items: RelationItem[];
}

/**
 * A named region of text found inside a document body.
 */
export interface TagSpan {
  /** Tag name, lowercased */
  name: string;

  /** Tag name as written in the open marker */
  writtenName: string;

  /** Raw inner text, exactly as written (nested tags unresolved) */
  inner: string;

  /** Nesting depth among recognized tags (0 = outermost) */
  depth: number;

  /** Offset of the open marker */
  start: number;

  /** Offset just past the close marker (end of text when unclosed) */
  end: number;

  /** Offset of the first inner character */
  innerStart: number;

  /** Offset just past the last inner character */
  innerEnd: number;

  /** False when the tag ran to end-of-document */
  closed: boolean;
}

/**
 * Maps one output metadata key to the sources searched for its value.
 */
export interface FieldMapping {
  /** Front-matter key */
  key: string;

  /** Tag names (or `@dotted.path` attribute lookups), in priority order */
  sources: string[];

  /** Emit `default` when no source matches */
  required: boolean;

  /** Value used for a required field with no match */
  default?: FrontMatterValue;

  /** Collect a list instead of a single scalar */
  list: boolean;
}

export type FrontMatterValue = string | number | boolean | string[];

/**
 * Ordered front-matter block
 */
export type FrontMatter = Map<string, FrontMatterValue>;

/**
 * Where a document lands in the destination tree.
 */
export interface IndexEntry {
  id: string;
  title: string;
  category: string;

  /** Source file the entry was built from */
  sourcePath: string;

  /** Destination path relative to the destination root, ending in .md */
  path: string;

  /** `path` without the .md extension, as written inside wiki-links */
  linkTarget: string;
}

/**
 * Two documents whose titles normalize identically.
 */
export interface TitleCollision {
  normalizedTitle: string;
  /** The entry title lookups resolve to */
  winnerId: string;
  /** The entry shadowed by the winner */
  shadowedId: string;
}

/**
 * Run-scoped lookup from identifier and normalized title to destination.
 * Built once before any conversion; read-only afterwards.
 */
export interface ReferenceIndex {
  byId: Map<string, IndexEntry>;
  byTitle: Map<string, IndexEntry>;
  /** All entries, in traversal order */
  entries: IndexEntry[];
  collisions: TitleCollision[];
  /** Identifiers seen more than once (first occurrence kept) */
  duplicateIds: string[];
}

/**
 * The output of converting one document.
 */
export interface ConvertedDocument {
  id: string;
  path: string;
  frontMatter: FrontMatter;
  body: string;
  /** Final file contents: front-matter block followed by the body */
  text: string;
}
