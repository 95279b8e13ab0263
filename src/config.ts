/**
 * Converter configuration.
 *
 * Loaded once from a YAML file (config.yaml by default), validated, and
 * passed as one value to every part of the pipeline. Relative directories
 * are resolved against the config file's directory; the image folder is
 * resolved inside the destination directory.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { FieldMapping, FrontMatterValue } from './types.js';
import { ConfigError, describeError } from './errors.js';
import { DEFAULT_IMAGE_PATTERN } from './assets.js';

export interface ConverterConfig {
  sourceDir: string;
  destinationDir: string;
  /** Where copied images go */
  resourceDir: string;
  /** Tag names extracted from document bodies */
  contentTags: string[];
  fieldMappings: FieldMapping[];
  attemptBBCode: boolean;
  imagePattern: string;
  debug: boolean;
  flattenFolders: boolean;
  folderNames: Record<string, string>;
  /** Heading level of the outermost extracted tag sections */
  sectionHeadingLevel: number;
  /** Heading over a document's extra sections and relations */
  extrasHeading: string;
}

const sourcesSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const frontMatterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const fieldMappingSchema = z.union([
  sourcesSchema,
  z.object({
    sources: sourcesSchema,
    required: z.boolean().default(false),
    default: frontMatterValueSchema.optional(),
    list: z.boolean().default(false)
  })
]);

// Front-matter filled from the export's own attributes
const DEFAULT_YAML_DATA: Record<string, z.input<typeof fieldMappingSchema>> = {
  creationDate: '@creationDate.date',
  template: '@template',
  world: '@world.title'
};

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export const configFileSchema = z.object({
  source_directory: z.string().min(1).default('World-Anvil-Export'),
  destination_directory: z.string().min(1).default('World-Anvil-Output'),
  obsidian_resource_folder: z.string().min(1).default('images'),
  content_tags_to_extract: z.array(z.string().min(1)).default(['description', 'secret']),
  yaml_data: z.record(fieldMappingSchema).default(DEFAULT_YAML_DATA),
  attempt_bbcode: z.boolean().default(true),
  image_search_pattern: z
    .string()
    .min(1)
    .refine(isValidRegex, { message: 'not a valid regular expression' })
    .default(DEFAULT_IMAGE_PATTERN),
  DEBUG: z.boolean().default(false),
  flatten_folders: z.boolean().default(false),
  folder_names: z.record(z.string().min(1)).default({}),
  section_heading_level: z.number().int().min(1).max(6).default(2),
  extras_heading: z.string().min(1).default('Extras')
});

export type ConfigFile = z.input<typeof configFileSchema>;

function toFieldMapping(key: string, entry: z.output<typeof fieldMappingSchema>): FieldMapping {
  if (typeof entry === 'string' || Array.isArray(entry)) {
    return { key, sources: typeof entry === 'string' ? [entry] : entry, required: false, list: false };
  }
  const mapping: FieldMapping = {
    key,
    sources: typeof entry.sources === 'string' ? [entry.sources] : entry.sources,
    required: entry.required,
    list: entry.list
  };
  const fallback: FrontMatterValue | undefined = entry.default;
  if (fallback !== undefined) {
    mapping.default = fallback;
  }
  return mapping;
}

/**
 * Validate a parsed config object and fill in defaults
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): ConverterConfig {
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const file = result.data;
  const destinationDir = path.resolve(baseDir, file.destination_directory);

  return {
    sourceDir: path.resolve(baseDir, file.source_directory),
    destinationDir,
    resourceDir: path.resolve(destinationDir, file.obsidian_resource_folder),
    contentTags: file.content_tags_to_extract.map(tag => tag.toLowerCase()),
    fieldMappings: Object.entries(file.yaml_data).map(([key, entry]) => toFieldMapping(key, entry)),
    attemptBBCode: file.attempt_bbcode,
    imagePattern: file.image_search_pattern,
    debug: file.DEBUG,
    flattenFolders: file.flatten_folders,
    folderNames: file.folder_names,
    sectionHeadingLevel: file.section_heading_level,
    extrasHeading: file.extras_heading
  };
}

/**
 * Load and validate the YAML config file
 */
export async function loadConfig(configPath: string): Promise<ConverterConfig> {
  const resolved = path.resolve(configPath);
  if (!(await fs.pathExists(resolved))) {
    throw new ConfigError(`Configuration file '${configPath}' not found.`);
  }

  let raw: unknown;
  try {
    raw = load(await fs.readFile(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${describeError(err)}`);
  }

  return parseConfig(raw, path.dirname(resolved));
}
