import { Diagnostics } from './diagnostics.js';

const MARKER_KINDS = [
  'b', 'i', 'u', 's', 'strike', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'p', 'br', 'hr', 'url', 'list', 'ul', 'ol', 'li', 'quote', 'code',
  'sup', 'sub', 'center', 'left', 'right', 'justify', '\\*'
];

/**
 * One recognized BBCode marker: "[b]", "[/b]", "[url=https://x]", "[*]"
 * Group 1: "/" for close markers
 * Group 2: marker kind
 * Group 3: argument after "="
 */
export const BBCODE_MARKER_PATTERN = new RegExp(
  `\\[(\\/?)(${MARKER_KINDS.join('|')})(?:=([^\\]\\n]*))?\\]`,
  'i'
);

// Scanned left to right; the first two branches are copied through as text:
// fenced code blocks, and the label of a "@[label](target)" reference
const SCAN_PATTERN = new RegExp(`(\`\`\`[\\s\\S]*?\`\`\`)|(@\\[[^\\]\\n]*\\])|${BBCODE_MARKER_PATTERN.source}`, 'gi');

/** Markers that never take a close marker */
const VOID_KINDS = new Set(['br', 'hr', '*']);

interface ElementNode {
  kind: string;
  arg?: string;
  /** The open marker exactly as written */
  raw: string;
  /** Offset of the open marker */
  start: number;
  children: BBNode[];
}

interface CodeNode {
  kind: 'code';
  content: string;
}

interface VoidNode {
  kind: 'br' | 'hr' | '*';
  raw: string;
}

type BBNode = string | ElementNode | CodeNode | VoidNode;

export interface TranslateResult {
  text: string;
  /** Markers left literal because they had no partner */
  warnings: number;
}

function isVoidNode(node: BBNode): node is VoidNode {
  return typeof node !== 'string' && VOID_KINDS.has(node.kind);
}

function isCodeNode(node: BBNode): node is CodeNode {
  return typeof node !== 'string' && 'content' in node;
}

/**
 * Build a node tree by matching each close marker to the nearest unmatched
 * open marker of the same kind. Markers without a partner are kept as text.
 * A close marker that would cross other open markers (`[b]a[i]b[/b]`) leaves
 * its whole element as written, so a second pass meets the same text.
 */
function parse(text: string, report: (message: string) => void): BBNode[] {
  const root: ElementNode = { kind: '', raw: '', start: 0, children: [] };
  const stack: ElementNode[] = [root];
  const pattern = new RegExp(SCAN_PATTERN.source, 'gi');
  let cursor = 0;

  const top = () => stack[stack.length - 1];
  const appendText = (value: string) => {
    if (value.length > 0) {
      top().children.push(value);
    }
  };

  // An unclosed element gives its open marker back as text, children kept
  const unwrap = (element: ElementNode) => {
    report(`${element.raw} is never closed`);
    const parent = top();
    parent.children.push(element.raw, ...element.children);
  };

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    appendText(text.slice(cursor, match.index));
    cursor = match.index + match[0].length;

    if (match[1] !== undefined || match[2] !== undefined) {
      appendText(match[0]);
      continue;
    }

    const isClose = match[3] === '/';
    const kind = match[4].toLowerCase();
    const arg = match[5];

    if (isClose) {
      if (VOID_KINDS.has(kind)) {
        continue;
      }
      let index = stack.length - 1;
      while (index > 0 && stack[index].kind !== kind) {
        index--;
      }
      if (index === 0) {
        report(`${match[0]} has no open marker`);
        appendText(match[0]);
        continue;
      }
      if (index < stack.length - 1) {
        const opener = stack[index];
        report(`${stack[index + 1].raw} overlaps ${match[0]}; left as written`);
        stack.length = index;
        appendText(text.slice(opener.start, cursor));
        continue;
      }
      const element = stack.pop();
      if (element) top().children.push(element);
      continue;
    }

    if (kind === 'br' || kind === 'hr' || kind === '*') {
      top().children.push({ kind, raw: match[0] });
      continue;
    }

    if (kind === 'code') {
      const closeAt = text.toLowerCase().indexOf('[/code]', cursor);
      if (closeAt === -1) {
        report('[code] is never closed');
        appendText(match[0]);
        continue;
      }
      top().children.push({ kind: 'code', content: text.slice(cursor, closeAt) });
      cursor = closeAt + '[/code]'.length;
      pattern.lastIndex = cursor;
      continue;
    }

    const element: ElementNode = { kind, raw: match[0], start: match.index, children: [] };
    if (arg !== undefined) {
      element.arg = arg;
    }
    stack.push(element);
  }

  appendText(text.slice(cursor));

  while (stack.length > 1) {
    const unclosed = stack.pop();
    if (unclosed) unwrap(unclosed);
  }

  return root.children;
}

function startLine(out: string): string {
  return out.length === 0 || out.endsWith('\n') ? out : `${out}\n`;
}

/**
 * Wrap inline content in a Markdown marker, keeping surrounding spaces
 * outside the marker so the emphasis stays valid
 */
function wrapInline(content: string, open: string, close: string = open): string {
  const core = content.trim();
  if (core.length === 0) {
    return content;
  }
  const leading = content.slice(0, content.indexOf(core));
  const trailing = content.slice(leading.length + core.length);
  return `${leading}${open}${core}${close}${trailing}`;
}

function indentContinuation(item: string, width: number): string {
  return item.split('\n').join(`\n${' '.repeat(width)}`);
}

function renderList(element: ElementNode): string {
  const ordered = element.kind === 'ol' || (element.kind === 'list' && element.arg !== undefined);
  const items: string[] = [];
  let current: string | null = null;

  const closeItem = () => {
    if (current !== null && current.trim().length > 0) {
      items.push(current.trim());
    }
    current = null;
  };

  for (const child of element.children) {
    if (isVoidNode(child) && child.kind === '*') {
      closeItem();
      current = '';
    } else if (typeof child !== 'string' && !isVoidNode(child) && !isCodeNode(child) && child.kind === 'li') {
      closeItem();
      items.push(renderNodes(child.children).trim());
    } else {
      current = (current ?? '') + renderNodes([child]);
    }
  }
  closeItem();

  return items
    .filter(item => item.length > 0)
    .map((item, n) => {
      const marker = ordered ? `${n + 1}. ` : '- ';
      return `${marker}${indentContinuation(item, marker.length)}`;
    })
    .join('\n');
}

function renderElement(element: ElementNode, out: string): string {
  const inner = () => renderNodes(element.children);

  switch (element.kind) {
    case 'b':
      return out + wrapInline(inner(), '**');
    case 'i':
      return out + wrapInline(inner(), '*');
    case 's':
    case 'strike':
      return out + wrapInline(inner(), '~~');
    case 'u':
      return `${out}<u>${inner()}</u>`;
    case 'sup':
      return `${out}<sup>${inner()}</sup>`;
    case 'sub':
      return `${out}<sub>${inner()}</sub>`;
    case 'h1':
    case 'h2':
    case 'h3':
    case 'h4':
    case 'h5':
    case 'h6': {
      const level = Number(element.kind.slice(1));
      return `${startLine(out)}${'#'.repeat(level)} ${inner().trim()}\n`;
    }
    case 'p':
      return `${out}${inner().trim()}\n\n`;
    case 'url': {
      const label = inner();
      const href = (element.arg ?? label).trim().replace(/^["']|["']$/g, '');
      return `${out}[${label.trim()}](${href})`;
    }
    case 'list':
    case 'ul':
    case 'ol': {
      const list = renderList(element);
      return list.length > 0 ? `${startLine(out)}${list}\n` : out;
    }
    case 'li':
      return `${startLine(out)}- ${inner().trim()}\n`;
    case 'quote': {
      const lines = inner().trim().split('\n').map(line => (line.length > 0 ? `> ${line}` : '>'));
      if (element.arg !== undefined && element.arg.trim().length > 0) {
        lines.push('>', `> *${element.arg.trim()}*`);
      }
      return `${startLine(out)}${lines.join('\n')}\n`;
    }
    default:
      // center, left, right, justify: alignment has no Markdown form
      return out + inner();
  }
}

function renderNodes(nodes: BBNode[]): string {
  let out = '';
  for (const node of nodes) {
    if (typeof node === 'string') {
      out += node;
    } else if (isCodeNode(node)) {
      const content = node.content.replace(/^\n+|\n+$/g, '');
      out = `${startLine(out)}\`\`\`\n${content}\n\`\`\`\n`;
    } else if (isVoidNode(node)) {
      if (node.kind === 'br') {
        out += '\n';
      } else if (node.kind === 'hr') {
        out = `${startLine(out)}---\n`;
      } else {
        out += node.raw;
      }
    } else {
      out = renderElement(node, out);
    }
  }
  return out;
}

/**
 * Rewrite BBCode formatting markers as Markdown.
 *
 * Best effort: markers without a partner stay as literal text and are
 * counted. Fenced code blocks and reference labels are never touched, and
 * `[img]` markers are left for the asset pass. Running it again on its own
 * output changes nothing.
 */
export function translateBBCode(text: string, diagnostics?: Diagnostics): TranslateResult {
  let warnings = 0;
  const nodes = parse(text, message => {
    warnings++;
    diagnostics?.warn('malformed-markup', message);
  });
  return { text: renderNodes(nodes), warnings };
}
