import { dump } from 'js-yaml';
import { FieldMapping, FrontMatter, FrontMatterValue, TagSpan } from './types.js';
import { BBCODE_MARKER_PATTERN } from './bbcode.js';
import { REFERENCE_PATTERN } from './references.js';

const ANGLE_TAG_PATTERN = /<\/?[A-Za-z][^<>]*>/g;

/**
 * Reduce a tag value to plain text for the front-matter block:
 * references keep their label, tag and BBCode markers are dropped,
 * whitespace is collapsed.
 */
export function stripMarkup(text: string): string {
  return text
    .replace(new RegExp(REFERENCE_PATTERN.source, 'g'), '$1')
    .replace(ANGLE_TAG_PATTERN, ' ')
    .replace(new RegExp(BBCODE_MARKER_PATTERN.source, 'gi'), ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function splitList(value: string): string[] {
  return value
    .split(/[,\n]/)
    .map(item => stripMarkup(item))
    .filter(item => item.length > 0);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow a dotted path into a parsed export object ("world.title")
 */
export function getAttribute(attributes: Record<string, unknown>, dottedPath: string): unknown {
  let current: unknown = attributes;
  for (const key of dottedPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function fromAttribute(value: unknown, list: boolean): FrontMatterValue | undefined {
  if (typeof value === 'string') {
    if (list) {
      const items = splitList(value);
      return items.length > 0 ? items : undefined;
    }
    const text = stripMarkup(value);
    return text.length > 0 ? text : undefined;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return list ? [String(value)] : value;
  }

  if (Array.isArray(value)) {
    const items = value
      .filter((item): item is string | number | boolean =>
        typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean')
      .map(item => stripMarkup(String(item)))
      .filter(item => item.length > 0);
    if (items.length === 0) {
      return undefined;
    }
    return list ? items : items.join(', ');
  }

  return undefined;
}

function fromTags(spans: TagSpan[], list: boolean): FrontMatterValue | undefined {
  if (list) {
    const items = spans.flatMap(span => splitList(span.inner));
    return items.length > 0 ? items : undefined;
  }

  for (const span of spans) {
    const text = stripMarkup(span.inner);
    if (text.length > 0) {
      return text;
    }
  }
  return undefined;
}

/**
 * Build the front-matter fields for one document.
 *
 * Each mapping's sources are tried in order and the first non-empty value
 * wins. A source is either a tag name or an `@dotted.path` into the document's
 * export attributes. Fields with no value are left out, unless required.
 */
export function buildFrontMatter(
  spans: Iterable<TagSpan>,
  mappings: FieldMapping[],
  attributes: Record<string, unknown> = {}
): FrontMatter {
  const spansByName = new Map<string, TagSpan[]>();
  for (const span of spans) {
    const group = spansByName.get(span.name);
    if (group) {
      group.push(span);
    } else {
      spansByName.set(span.name, [span]);
    }
  }

  const frontMatter: FrontMatter = new Map();

  for (const mapping of mappings) {
    let value: FrontMatterValue | undefined;

    for (const source of mapping.sources) {
      value = source.startsWith('@')
        ? fromAttribute(getAttribute(attributes, source.slice(1)), mapping.list)
        : fromTags(spansByName.get(source.toLowerCase()) ?? [], mapping.list);
      if (value !== undefined) {
        break;
      }
    }

    if (value === undefined && mapping.required) {
      value = mapping.default ?? (mapping.list ? [] : '');
    }

    if (value !== undefined) {
      frontMatter.set(mapping.key, value);
    }
  }

  return frontMatter;
}

/**
 * Serialize front-matter as a YAML block between `---` fences.
 * The YAML emitter quotes values whose colons or quotes would otherwise
 * break the block. An empty map produces an empty string.
 */
export function renderFrontMatter(frontMatter: FrontMatter): string {
  if (frontMatter.size === 0) {
    return '';
  }
  const yaml = dump(Object.fromEntries(frontMatter), {
    sortKeys: false,
    lineWidth: -1,
    noRefs: true
  });
  return `---\n${yaml}---\n`;
}
