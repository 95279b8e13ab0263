import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  buildReferenceIndex,
  formatWikiLink,
  normalizeTitle,
  resolveReferences,
  resolveRelationItem,
  slugifyTitle
} from '../references.js';
import { Diagnostics } from '../diagnostics.js';
import { SourceDocument } from '../types.js';

const { describe, it } = test;

function doc(id: string, title: string, category: string): SourceDocument {
  return {
    id,
    title,
    category,
    body: '',
    images: [],
    sourcePath: `${id}.json`,
    attributes: {},
    sections: [],
    relations: []
  };
}

const folderNames = { location: 'Locations', person: 'People' };

function sampleIndex() {
  return buildReferenceIndex(
    [doc('42', "Dragon's Lair", 'location'), doc('7', 'King Aldric', 'person')],
    { folderNames }
  );
}

describe('normalizeTitle', () => {

  it('should drop accents and punctuation', () => {
    assert.strictEqual(normalizeTitle("Dragon's  Lair"), 'dragons lair');
    assert.strictEqual(normalizeTitle('  Café  Ñoño '), 'cafe nono');
  });
});

describe('slugifyTitle', () => {

  it('should make a file stem from a title', () => {
    assert.strictEqual(slugifyTitle("Dragon's Lair"), 'Dragons-Lair');
    assert.strictEqual(slugifyTitle('A / B'), 'A-B');
  });
});

describe('buildReferenceIndex', () => {

  it('should place documents in their category folders', () => {
    const index = sampleIndex();

    assert.deepStrictEqual(index.entries.map(e => e.path), ['Locations/Dragons-Lair.md', 'People/King-Aldric.md']);
    assert.strictEqual(index.byId.get('42')?.linkTarget, 'Locations/Dragons-Lair');
  });

  it('should use the category as the folder when it has no mapping', () => {
    const index = buildReferenceIndex([doc('1', 'Moon Cult', 'organization')]);
    assert.strictEqual(index.entries[0].path, 'organization/Moon-Cult.md');
  });

  it('should put everything in the root when folders are flattened', () => {
    const index = buildReferenceIndex([doc('42', "Dragon's Lair", 'location')], { flattenFolders: true, folderNames });
    assert.strictEqual(index.entries[0].path, 'Dragons-Lair.md');
  });

  it('should keep categories from leaving the destination or breaking links', () => {
    const index = buildReferenceIndex([doc('1', 'Escape', '..'), doc('2', 'Piped', 'a|b#c^[d]')]);

    assert.deepStrictEqual(index.entries.map(e => e.path), ['Escape.md', 'abcd/Piped.md']);
  });

  it('should let the first document win a title collision', () => {
    const diagnostics = new Diagnostics();
    const index = buildReferenceIndex([doc('1', 'The Keep', 'place'), doc('2', 'the keep!', 'place')], {}, diagnostics);

    assert.deepStrictEqual(index.entries.map(e => e.path), ['place/The-Keep.md', 'place/the-keep-2.md']);
    assert.deepStrictEqual(index.collisions, [{ normalizedTitle: 'the keep', winnerId: '1', shadowedId: '2' }]);
    assert.strictEqual(index.byTitle.get('the keep')?.id, '1');
    assert.strictEqual(index.byId.get('2')?.path, 'place/the-keep-2.md');
    assert.strictEqual(diagnostics.count('title-collision'), 1);
  });

  it('should keep the first document of a repeated identifier', () => {
    const diagnostics = new Diagnostics();
    const index = buildReferenceIndex([doc('1', 'First', 'place'), doc('1', 'Second', 'place')], {}, diagnostics);

    assert.strictEqual(index.entries.length, 1);
    assert.strictEqual(index.byId.get('1')?.title, 'First');
    assert.deepStrictEqual(index.duplicateIds, ['1']);
    assert.strictEqual(diagnostics.count('duplicate-id'), 1);
  });
});

describe('resolveReferences', () => {

  it('should link resolved references and unwrap missing ones', () => {
    const result = resolveReferences('See @[the king](person:7) and @[Nowhere](location:999).', sampleIndex());

    assert.strictEqual(result.text, 'See [[People/King-Aldric|King Aldric]] and Nowhere.');
    assert.strictEqual(result.resolved, 1);
    assert.deepStrictEqual(result.unresolved, [{ label: 'Nowhere', target: 'location:999' }]);
  });

  it('should resolve title references by normalized title', () => {
    const result = resolveReferences("Enter @[dragon's lair].", sampleIndex());

    assert.strictEqual(result.text, "Enter [[Locations/Dragons-Lair|Dragon's Lair]].");
    assert.deepStrictEqual(result.unresolved, []);
  });

  it('should accept a bare identifier as the target', () => {
    assert.strictEqual(resolveReferences('@[x](42)', sampleIndex()).text, "[[Locations/Dragons-Lair|Dragon's Lair]]");
  });

  it('should link a document to itself', () => {
    const result = resolveReferences('Back to @[here](location:42).', sampleIndex());

    assert.strictEqual(result.text, "Back to [[Locations/Dragons-Lair|Dragon's Lair]].");
    assert.strictEqual(result.resolved, 1);
  });

  it('should give the same result whatever else was resolved first', () => {
    const index = sampleIndex();
    const first = 'See @[the king](person:7) near @[Nowhere](location:999).';
    const second = "Home: @[dragon's lair].";

    const before = resolveReferences(first, index);
    resolveReferences(second, index);
    const after = resolveReferences(first, index);

    assert.deepStrictEqual(after, before);
  });

  it('should not fall back to the label when the identifier is missing', () => {
    const result = resolveReferences("@[Dragon's Lair](location:999)", sampleIndex());

    assert.strictEqual(result.text, "Dragon's Lair");
    assert.strictEqual(result.resolved, 0);
  });
});

describe('formatWikiLink', () => {

  it('should keep brackets and pipes out of the label', () => {
    const index = buildReferenceIndex([doc('1', 'A|B [x]', 'misc')]);
    assert.strictEqual(formatWikiLink(index.entries[0]), '[[misc/AB-x|A-B x]]');
  });
});

describe('resolveRelationItem', () => {

  it('should link items found in the index', () => {
    const result = resolveRelationItem({ id: '7', title: 'Anything', relationshipType: 'article' }, sampleIndex());
    assert.deepStrictEqual(result, { text: '[[People/King-Aldric|King Aldric]]', resolved: true });
  });

  it('should fall back to the plain title', () => {
    const result = resolveRelationItem({ title: 'Ghost', relationshipType: 'article' }, sampleIndex());
    assert.deepStrictEqual(result, { text: 'Ghost', resolved: false });
  });
});
