import * as test from 'node:test';
import * as assert from 'node:assert';
import fs from 'fs-extra';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig, parseConfig } from '../config.js';
import { ConfigError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

describe('parseConfig', () => {

  it('should fill in defaults', () => {
    const config = parseConfig({}, '/base');

    assert.strictEqual(config.sourceDir, path.resolve('/base/World-Anvil-Export'));
    assert.strictEqual(config.destinationDir, path.resolve('/base/World-Anvil-Output'));
    assert.strictEqual(config.resourceDir, path.resolve('/base/World-Anvil-Output/images'));
    assert.deepStrictEqual(config.contentTags, ['description', 'secret']);
    assert.deepStrictEqual(config.fieldMappings.map(m => [m.key, m.sources]), [
      ['creationDate', ['@creationDate.date']],
      ['template', ['@template']],
      ['world', ['@world.title']]
    ]);
    assert.strictEqual(config.attemptBBCode, true);
    assert.strictEqual(config.flattenFolders, false);
    assert.strictEqual(config.sectionHeadingLevel, 2);
    assert.strictEqual(config.extrasHeading, 'Extras');
  });

  it('should treat an empty file as all defaults', () => {
    assert.strictEqual(parseConfig(null, '/base').debug, false);
  });

  it('should read every form of field mapping', () => {
    const config = parseConfig({
      yaml_data: {
        summary: ['summary', '@excerpt'],
        tags: { sources: '@tags', list: true },
        status: { sources: ['status'], required: true, default: 'draft' }
      }
    });

    assert.deepStrictEqual(config.fieldMappings, [
      { key: 'summary', sources: ['summary', '@excerpt'], required: false, list: false },
      { key: 'tags', sources: ['@tags'], required: false, list: true },
      { key: 'status', sources: ['status'], required: true, list: false, default: 'draft' }
    ]);
  });

  it('should lowercase content tags', () => {
    assert.deepStrictEqual(parseConfig({ content_tags_to_extract: ['Secret'] }).contentTags, ['secret']);
  });

  it('should list every invalid setting', () => {
    assert.throws(
      () => parseConfig({ image_search_pattern: '([', section_heading_level: 9 }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.strictEqual(err.issues.length, 2);
        assert.strictEqual(err.issues[0], 'image_search_pattern: not a valid regular expression');
        assert.ok(err.issues[1].startsWith('section_heading_level: '));
        return true;
      }
    );
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'config-'));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should resolve directories against the config file', async () => {
    const file = path.join(root, 'config.yaml');
    await fs.outputFile(file, 'source_directory: in\ndestination_directory: out\nobsidian_resource_folder: media\n');

    const config = await loadConfig(file);

    assert.strictEqual(config.sourceDir, path.join(root, 'in'));
    assert.strictEqual(config.destinationDir, path.join(root, 'out'));
    assert.strictEqual(config.resourceDir, path.join(root, 'out', 'media'));
  });

  it('should report a missing file', async () => {
    const file = path.join(root, 'missing.yaml');

    await assert.rejects(loadConfig(file), {
      name: 'ConfigError',
      message: `Configuration file '${file}' not found.`
    });
  });

  it('should report YAML that does not parse', async () => {
    const file = path.join(root, 'broken.yaml');
    await fs.outputFile(file, 'source_directory: [in\n');

    await assert.rejects(loadConfig(file), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.ok(err.message.startsWith(`Could not parse ${file}: `));
      return true;
    });
  });
});
