import { TagSpan } from './types.js';
import { Diagnostics } from './diagnostics.js';

/**
 * Regex for the export dialect's tag markers
 */

// Matches open, close and self-closing markers: "<secret>", "</secret>",
// "<note kind="gm">", "<divider/>"
// Group 1: "/" for close markers
// Group 2: tag name
// Group 3: "/" for self-closing markers
const TAG_MARKER_PATTERN = /<(\/?)([A-Za-z][\w-]*)(?:\s[^<>]*?)?\s*(\/?)>/g;

/**
 * An open marker waiting for its close
 */
interface OpenTag {
  name: string;
  writtenName: string;
  start: number;
  innerStart: number;
  depth: number;
}

function findOpener(stack: OpenTag[], name: string): number {
  for (let i = stack.length - 1; i >= 0; i--) {
    if (stack[i].name === name) {
      return i;
    }
  }
  return -1;
}

/**
 * Scan text for the named tags and yield their spans in document order,
 * outer spans before the spans nested inside them.
 *
 * Each close marker pairs with the nearest unmatched open marker of the same
 * name. Spans are released whenever the stack of open tags empties, so a
 * consumer sees each top-level region as soon as it is settled.
 *
 * Malformed input never throws:
 * - a tag left open runs to the end of the text (`closed: false`)
 * - interleaved tags (`<a><b></a></b>`) yield nothing for the interleaved
 *   region, which is left as it was
 * - a close marker with no opener stays literal
 * Each case is reported to `diagnostics` as malformed markup.
 */
export function* extractTags(
  text: string,
  names: Iterable<string>,
  diagnostics?: Diagnostics
): Generator<TagSpan, void, undefined> {
  const wanted = new Set(Array.from(names, name => name.toLowerCase()));
  if (wanted.size === 0) {
    return;
  }

  const pattern = new RegExp(TAG_MARKER_PATTERN.source, 'g');
  const stack: OpenTag[] = [];
  // Openers dropped because of an overlap; their close markers are absorbed quietly
  const dropped = new Map<string, number>();
  let pending: TagSpan[] = [];

  function* flush(): Generator<TagSpan, void, undefined> {
    pending.sort((a, b) => a.start - b.start);
    const settled = pending;
    pending = [];
    yield* settled;
  }

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    const name = match[2].toLowerCase();
    if (!wanted.has(name)) {
      continue;
    }

    const markerStart = match.index;
    const markerEnd = match.index + match[0].length;

    if (match[1] === '/') {
      const openerIndex = findOpener(stack, name);

      if (openerIndex === -1) {
        const absorbed = dropped.get(name) ?? 0;
        if (absorbed > 0) {
          dropped.set(name, absorbed - 1);
        } else {
          diagnostics?.warn('malformed-markup', `Unmatched </${name}> at offset ${markerStart}`);
        }
        continue;
      }

      const opener = stack[openerIndex];

      if (openerIndex < stack.length - 1) {
        const interleaved = stack.slice(openerIndex + 1);
        diagnostics?.warn(
          'malformed-markup',
          `<${interleaved[0].name}> overlaps </${name}> at offset ${markerStart}; region left unmodified`
        );
        for (const tag of interleaved) {
          dropped.set(tag.name, (dropped.get(tag.name) ?? 0) + 1);
        }
        stack.length = openerIndex;
        pending = pending.filter(span => span.start < opener.start);
      } else {
        stack.pop();
        pending.push({
          name,
          writtenName: opener.writtenName,
          inner: text.slice(opener.innerStart, markerStart),
          depth: opener.depth,
          start: opener.start,
          end: markerEnd,
          innerStart: opener.innerStart,
          innerEnd: markerStart,
          closed: true
        });
      }
    } else if (match[3] === '/') {
      pending.push({
        name,
        writtenName: match[2],
        inner: '',
        depth: stack.length,
        start: markerStart,
        end: markerEnd,
        innerStart: markerEnd,
        innerEnd: markerEnd,
        closed: true
      });
    } else {
      stack.push({ name, writtenName: match[2], start: markerStart, innerStart: markerEnd, depth: stack.length });
      continue;
    }

    if (stack.length === 0) {
      yield* flush();
    }
  }

  // Anything still open runs to the end of the text
  while (stack.length > 0) {
    const opener = stack.pop();
    if (!opener) break;
    diagnostics?.warn('malformed-markup', `<${opener.name}> at offset ${opener.start} is never closed`);
    pending.push({
      name: opener.name,
      writtenName: opener.writtenName,
      inner: text.slice(opener.innerStart),
      depth: opener.depth,
      start: opener.start,
      end: text.length,
      innerStart: opener.innerStart,
      innerEnd: text.length,
      closed: false
    });
  }

  yield* flush();
}

/**
 * Turn a tag or section name into a heading: "plot_hooks" -> "Plot Hooks",
 * "currentLocation" -> "Current Location"
 */
export function humanizeName(name: string): string {
  return name
    .replace(/([a-z\d])([A-Z])/g, '$1 $2')
    .split(/[_\-\s]+/)
    .filter(word => word.length > 0)
    .map(word => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Replace each extracted span with a Markdown section headed by the tag's
 * name as written. Nested spans become sections one level deeper. Text outside the spans
 * is copied through untouched.
 *
 * @param spans - spans of `text`, as yielded by extractTags
 * @param level - heading level for the outermost spans
 */
export function renderTagSections(text: string, spans: TagSpan[], level: number): string {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  return renderRange(text, 0, text.length, sorted, level);
}

function renderRange(text: string, from: number, to: number, spans: TagSpan[], level: number): string {
  let out = '';
  let cursor = from;
  let afterSection = false;
  let i = 0;

  while (i < spans.length) {
    const span = spans[i];

    // Everything that starts before this span ends is nested inside it
    let j = i + 1;
    while (j < spans.length && spans[j].start < span.end) {
      j++;
    }

    out += leadingText(text.slice(cursor, span.start), afterSection);
    out = out.replace(/\s+$/, '');
    if (out.length > 0) {
      out += '\n\n';
    }

    const heading = `${'#'.repeat(Math.min(level, 6))} ${humanizeName(span.writtenName)}`;
    const content = renderRange(text, span.innerStart, span.innerEnd, spans.slice(i + 1, j), level + 1).trim();
    out += content.length > 0 ? `${heading}\n\n${content}\n\n` : `${heading}\n\n`;

    cursor = span.end;
    afterSection = true;
    i = j;
  }

  out += leadingText(text.slice(cursor, to), afterSection);
  return out;
}

function leadingText(segment: string, afterSection: boolean): string {
  return afterSection ? segment.replace(/^\s+/, '') : segment;
}
