import * as path from 'node:path';
import { ConvertedDocument, ReferenceIndex, SourceDocument } from './types.js';
import { ConverterConfig } from './config.js';
import { Diagnostics } from './diagnostics.js';
import { AssetPipeline } from './assets.js';
import { DocumentConversionError, ExportAbortError } from './errors.js';
import { extractTags, humanizeName, renderTagSections } from './tag-extractor.js';
import { buildFrontMatter, renderFrontMatter } from './metadata-mapper.js';
import { translateBBCode } from './bbcode.js';
import { resolveReferences, resolveRelationItem } from './references.js';

/**
 * Everything a document conversion reads or shares with the rest of the run
 */
export interface ConversionContext {
  config: ConverterConfig;
  /** Complete index of the export; built before the first conversion */
  index: ReferenceIndex;
  /** Run-scoped image record, shared by all documents */
  assets: AssetPipeline;
  diagnostics: Diagnostics;
}

// Split on fenced code blocks; odd entries are the blocks themselves
const FENCED_BLOCK_PATTERN = /(```[\s\S]*?```)/;

/**
 * Collapse runs of blank lines to a single blank line, outside code blocks
 */
export function normalizeBlankLines(text: string): string {
  return text
    .split(FENCED_BLOCK_PATTERN)
    .map((part, i) => (i % 2 === 1 ? part : part.replace(/\n[ \t]*\n(?:[ \t]*\n)+/g, '\n\n')))
    .join('');
}

/**
 * BBCode, then references, then images. Links and embeds are written after
 * the BBCode pass so their brackets are never read as BBCode.
 */
async function convertText(text: string, documentDir: string, ctx: ConversionContext): Promise<string> {
  let out = text;

  if (ctx.config.attemptBBCode) {
    out = translateBBCode(out, ctx.diagnostics).text;
  }

  const references = resolveReferences(out, ctx.index);
  for (const missing of references.unresolved) {
    const target = missing.target !== undefined ? ` (${missing.target})` : '';
    ctx.diagnostics.warn('unresolved-reference', `"${missing.label}"${target} is not in the export`);
  }
  out = references.text;

  return ctx.assets.rewriteImages(out, documentDir);
}

async function renderExtras(doc: SourceDocument, documentDir: string, ctx: ConversionContext): Promise<string> {
  const parts: string[] = [];

  for (const section of doc.sections) {
    const content = (await convertText(section.content.replace(/\r\n?/g, '\n'), documentDir, ctx)).trim();
    parts.push(`## ${humanizeName(section.key)}\n\n${content}\n`);
  }

  for (const relation of doc.relations) {
    const lines = relation.items.map(item => {
      const { text, resolved } = resolveRelationItem(item, ctx.index);
      if (!resolved && item.relationshipType.toLowerCase() === 'article') {
        ctx.diagnostics.warn('unresolved-reference', `Related article "${item.title}" is not in the export`);
      }
      return text;
    });
    parts.push(`## ${humanizeName(relation.key)}\n\n${lines.join('\n')}\n`);
  }

  return parts.length > 0 ? `# ${ctx.config.extrasHeading}\n\n${parts.join('\n')}` : '';
}

/**
 * Convert one document. The steps run in a fixed order:
 * 1. extract the configured tags
 * 2. build front-matter from them
 * 3. translate BBCode (when enabled)
 * 4. resolve references
 * 5. copy and embed images
 * 6. assemble front-matter and body
 *
 * Any error is rethrown as a DocumentConversionError carrying the document id,
 * except an ExportAbortError, which ends the run.
 */
export async function convertDocument(doc: SourceDocument, ctx: ConversionContext): Promise<ConvertedDocument> {
  const { config, index, assets, diagnostics } = ctx;
  diagnostics.setDocument(doc.id);

  try {
    const entry = index.byId.get(doc.id);
    if (!entry) {
      throw new Error(`Document ${doc.id} is not in the reference index`);
    }
    const documentDir = path.dirname(path.join(config.sourceDir, doc.sourcePath));

    const spans = [...extractTags(doc.body, config.contentTags, diagnostics)];
    const frontMatter = buildFrontMatter(spans, config.fieldMappings, doc.attributes);

    const sections = renderTagSections(doc.body, spans, config.sectionHeadingLevel);
    const parts: string[] = [];

    const embeds: string[] = [];
    for (const image of doc.images) {
      embeds.push(await assets.embed(image, documentDir));
    }
    if (embeds.length > 0) {
      parts.push(embeds.join('\n'));
    }

    parts.push(await convertText(sections, documentDir, ctx));
    parts.push(await renderExtras(doc, documentDir, ctx));

    const body = normalizeBlankLines(
      parts
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .join('\n\n')
    );
    const block = renderFrontMatter(frontMatter);
    const finalBody = body.length > 0 ? `${body}\n` : '';

    return {
      id: doc.id,
      path: entry.path,
      frontMatter,
      body: finalBody,
      text: block.length > 0 ? `${block}\n${finalBody}` : finalBody
    };
  } catch (err) {
    if (err instanceof ExportAbortError) {
      throw err;
    }
    throw new DocumentConversionError(doc.id, err);
  } finally {
    diagnostics.setDocument(undefined);
  }
}
