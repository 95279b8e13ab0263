import * as test from 'node:test';
import * as assert from 'node:assert';
import { buildFrontMatter, getAttribute, renderFrontMatter, stripMarkup } from '../metadata-mapper.js';
import { extractTags } from '../tag-extractor.js';
import { FieldMapping, FrontMatter } from '../types.js';

const { describe, it } = test;

function mapping(key: string, sources: string[], extra: Partial<FieldMapping> = {}): FieldMapping {
  return { key, sources, required: false, list: false, ...extra };
}

describe('stripMarkup', () => {

  it('should keep reference labels and drop markers', () => {
    const text = 'Ruled by @[the king](person:7), <b>bold</b> [i]x[/i]';
    assert.strictEqual(stripMarkup(text), 'Ruled by the king, bold x');
  });

  it('should collapse whitespace', () => {
    assert.strictEqual(stripMarkup('  one\n\n  two  '), 'one two');
  });
});

describe('getAttribute', () => {

  it('should follow dotted paths', () => {
    const attributes = { world: { title: 'Eldermere' }, template: 'location' };
    assert.strictEqual(getAttribute(attributes, 'world.title'), 'Eldermere');
    assert.strictEqual(getAttribute(attributes, 'template'), 'location');
  });

  it('should return undefined when a step is missing or not an object', () => {
    const attributes = { template: 'location' };
    assert.strictEqual(getAttribute(attributes, 'world.title'), undefined);
    assert.strictEqual(getAttribute(attributes, 'template.name'), undefined);
  });
});

describe('buildFrontMatter', () => {

  it('should fill scalar and list fields from tags', () => {
    const text = '<summary>A [b]bold[/b] place</summary><tags>forest, ruins\ncaves</tags>';
    const spans = [...extractTags(text, ['summary', 'tags'])];
    const fm = buildFrontMatter(spans, [
      mapping('summary', ['summary']),
      mapping('tags', ['tags'], { list: true })
    ]);

    assert.deepStrictEqual([...fm.entries()], [
      ['summary', 'A bold place'],
      ['tags', ['forest', 'ruins', 'caves']]
    ]);
  });

  it('should take the first source that has a value', () => {
    const spans = [...extractTags('<headline> </headline><summary>Windy</summary>', ['headline', 'summary'])];
    const fm = buildFrontMatter(spans, [mapping('summary', ['headline', 'summary'])]);

    assert.strictEqual(fm.get('summary'), 'Windy');
  });

  it('should read @path sources from the document attributes', () => {
    const attributes = { world: { title: 'Eldermere' }, views: 12, tags: ['a', 'b'] };
    const fm = buildFrontMatter([], [
      mapping('world', ['@world.title']),
      mapping('views', ['@views']),
      mapping('tags', ['@tags']),
      mapping('created', ['@creationDate.date'])
    ], attributes);

    assert.deepStrictEqual([...fm.entries()], [
      ['world', 'Eldermere'],
      ['views', 12],
      ['tags', 'a, b']
    ]);
  });

  it('should emit defaults for required fields with no value', () => {
    const fm = buildFrontMatter([], [
      mapping('status', ['status'], { required: true, default: 'unknown' }),
      mapping('aliases', ['aliases'], { required: true, list: true }),
      mapping('summary', ['summary'], { required: true }),
      mapping('optional', ['optional'])
    ]);

    assert.deepStrictEqual([...fm.entries()], [
      ['status', 'unknown'],
      ['aliases', []],
      ['summary', '']
    ]);
  });

  it('should match tag sources case-insensitively', () => {
    const spans = [...extractTags('<summary>Calm</summary>', ['summary'])];
    const fm = buildFrontMatter(spans, [mapping('summary', ['Summary'])]);

    assert.strictEqual(fm.get('summary'), 'Calm');
  });
});

describe('renderFrontMatter', () => {

  it('should quote values that would break the block', () => {
    const fm: FrontMatter = new Map();
    fm.set('title', "Dragon's Lair");
    fm.set('note', 'Warning: dragons');
    fm.set('quote', '"Fire" they said');
    fm.set('tags', ['a', 'b']);
    fm.set('level', 3);

    assert.strictEqual(
      renderFrontMatter(fm),
      [
        '---',
        "title: Dragon's Lair",
        "note: 'Warning: dragons'",
        "quote: '\"Fire\" they said'",
        'tags:',
        '  - a',
        '  - b',
        'level: 3',
        '---',
        ''
      ].join('\n')
    );
  });

  it('should render nothing for empty front-matter', () => {
    assert.strictEqual(renderFrontMatter(new Map()), '');
  });
});
