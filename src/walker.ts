import fs from 'fs-extra';
import * as path from 'node:path';
import { ConvertedDocument } from './types.js';
import { ConverterConfig } from './config.js';
import { Diagnostics, WarningKind } from './diagnostics.js';
import { Logger } from './logger.js';
import { AssetPipeline } from './assets.js';
import { convertDocument } from './converter.js';
import { buildReferenceIndex } from './references.js';
import { loadExport } from './loader.js';
import { describeError, ExportAbortError } from './errors.js';

/**
 * A source file that produced no output
 */
export interface SkippedDocument {
  /** Absent when the file could not be parsed at all */
  id?: string;
  sourcePath: string;
  reason: string;
}

/**
 * Outcome of one export run
 */
export interface ExportSummary {
  converted: number;
  /** Destination paths written, relative to the destination directory */
  written: string[];
  skipped: SkippedDocument[];
  warnings: Record<WarningKind, number>;
  assetsCopied: number;
}

/**
 * Convert the whole export.
 *
 * Loads every document, builds the reference index, then converts and
 * writes the documents one at a time in traversal order. A document that
 * fails to convert is logged and skipped. Failing to read the source tree or
 * to write the destination, images included, aborts the run with an
 * ExportAbortError naming the path; files already written stay in place.
 */
export async function runExport(config: ConverterConfig, logger: Logger): Promise<ExportSummary> {
  const diagnostics = new Diagnostics(logger);
  const skipped: SkippedDocument[] = [];
  const written: string[] = [];

  const { documents, failures } = await loadExport(config.sourceDir);
  logger.info(`Total export files found: ${documents.length + failures.length}`);

  for (const failure of failures) {
    logger.error(`Skipping ${failure.sourcePath}: ${failure.reason}`);
    skipped.push({ sourcePath: failure.sourcePath, reason: failure.reason });
  }

  const index = buildReferenceIndex(
    documents,
    { flattenFolders: config.flattenFolders, folderNames: config.folderNames },
    diagnostics
  );
  const assets = new AssetPipeline(
    { sourceRoot: config.sourceDir, resourceDir: config.resourceDir, imagePattern: config.imagePattern },
    diagnostics
  );

  try {
    await fs.ensureDir(config.destinationDir);
  } catch (err) {
    throw new ExportAbortError(config.destinationDir, err);
  }

  for (const doc of documents) {
    const entry = index.byId.get(doc.id);
    if (!entry || entry.sourcePath !== doc.sourcePath) {
      skipped.push({ id: doc.id, sourcePath: doc.sourcePath, reason: `duplicate identifier ${doc.id}` });
      continue;
    }

    let converted: ConvertedDocument;
    try {
      converted = await convertDocument(doc, { config, index, assets, diagnostics });
    } catch (err) {
      if (err instanceof ExportAbortError) {
        throw err;
      }
      logger.error(`${describeError(err)} (${doc.sourcePath})`);
      skipped.push({ id: doc.id, sourcePath: doc.sourcePath, reason: describeError(err) });
      continue;
    }

    const target = path.join(config.destinationDir, converted.path);
    try {
      await fs.outputFile(target, converted.text, 'utf-8');
    } catch (err) {
      throw new ExportAbortError(target, err);
    }
    written.push(converted.path);
    logger.debug(`Wrote ${converted.path}`);
  }

  const summary: ExportSummary = {
    converted: written.length,
    written,
    skipped,
    warnings: diagnostics.countsByKind(),
    assetsCopied: assets.copiedCount
  };

  logger.info(
    `Finished. Converted ${summary.converted} articles with ${skipped.length} failures ` +
    `and copied ${summary.assetsCopied} images. Please validate your results.`
  );
  for (const doc of skipped) {
    logger.warn(`Skipped ${doc.sourcePath}${doc.id !== undefined ? ` (${doc.id})` : ''}: ${doc.reason}`);
  }

  return summary;
}
