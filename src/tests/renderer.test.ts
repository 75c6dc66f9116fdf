import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { collectDiagnostics } from '../diagnostics.js';
import { Block } from '../document.js';
import { ParameterError } from '../errors.js';
import { parseControl } from '../parser.js';
import { dumpDocument, renderBlock, renderDocument } from '../renderer.js';

const { describe, it } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

function parse(content: string) {
  const collected = collectDiagnostics();
  return { ...parseControl(content, 'render.control', collected.diagnostics), ...collected };
}

function shape(block: Block) {
  return block.chunks.map(chunk => [chunk.kind, chunk.text]);
}

describe('renderBlock', () => {

  it('should render each chunk kind with its prefix', () => {
    const { document } = parse('Maintainer: A <a@example.com>\n continuation line\n .\n  fixed\n');
    const block = document.sections[0].blocks[0];

    assert.strictEqual(
      renderBlock(block),
      'Maintainer: A <a@example.com>\n continuation line\n .\n  fixed\n'
    );
  });

  it('should render an empty first chunk as a bare field name', () => {
    const { document } = parse('Build-Depends:\n debhelper\n');

    assert.strictEqual(renderBlock(document.sections[0].blocks[0]), 'Build-Depends:\n debhelper\n');
  });

  it('should refuse a block without chunks', () => {
    const block = new Block('Empty', { path: 'x', line: 1 });
    assert.throws(() => renderBlock(block), ParameterError);
  });

  it('should round-trip every block of the fixture', () => {
    const fixturePath = path.join(__dirname, 'fixtures', 'sample.control');
    const { document, status, warnings } = parse(fs.readFileSync(fixturePath, 'utf-8'));
    assert.ok(status.ok);
    assert.strictEqual(warnings.length, 0);

    for (const section of document.sections) {
      for (const block of section.blocks) {
        const reparsed = parse(renderBlock(block));
        assert.ok(reparsed.status.ok);

        const copy = reparsed.document.sections[0].head;
        assert.ok(copy);
        assert.strictEqual(copy.name, block.name);
        assert.deepStrictEqual(shape(copy), shape(block));
      }
    }
  });
});

describe('renderDocument', () => {

  it('should separate sections with one blank line', () => {
    const { document } = parse('A: 1\n\n\nB: 2\n b\n');
    assert.strictEqual(renderDocument(document), 'A: 1\n\nB: 2\n b\n');
  });

  it('should skip empty sections', () => {
    const { document } = parse('A: 1\n\n');
    assert.strictEqual(renderDocument(document), 'A: 1\n');
  });

  it('should drop comments and merge duplicate fields', () => {
    const { document } = parse('# note\nA: 1\na: 2\n');
    assert.strictEqual(renderDocument(document), 'A: 1\n  2\n');
  });
});

describe('dumpDocument', () => {

  it('should list sections, fields and chunks', () => {
    const { document } = parse('Source: foo\n\nPackage: bar\nDescription: x\n .\n more\n');

    assert.strictEqual(dumpDocument(document), [
      '------ Section 1 ------',
      '  Source',
      '[fixed] foo',
      '------ Section 2 ------',
      '  Package',
      '[fixed] bar',
      '  Description',
      '[fixed] x',
      '[empty]',
      '[merge] more',
      ''
    ].join('\n'));
  });

  it('should list the lone section of empty input', () => {
    const { document } = parse('');
    assert.strictEqual(dumpDocument(document), '------ Section 1 ------\n');
  });
});
