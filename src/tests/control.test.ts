import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { blockValue, interpretControl } from '../control.js';
import { collectDiagnostics } from '../diagnostics.js';
import { PackageNameError } from '../errors.js';
import { parseControl } from '../parser.js';

const { describe, it } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

function parse(content: string) {
  const collected = collectDiagnostics();
  return { ...parseControl(content, 'test', collected.diagnostics), ...collected };
}

function firstBlock(content: string) {
  const block = parse(content).document.sections[0].head;
  assert.ok(block);
  return block;
}

describe('blockValue', () => {

  it('should join merge chunks onto the previous line', () => {
    assert.strictEqual(blockValue(firstBlock('Build-Depends: debhelper (>= 9),\n perl\n')), 'debhelper (>= 9), perl');
  });

  it('should start a new line for fixed chunks and a blank one for empty chunks', () => {
    const block = firstBlock('Description: short\n long text\n .\n  code\n');
    assert.strictEqual(blockValue(block), 'short long text\n\ncode');
  });

  it('should ignore an empty first chunk', () => {
    assert.strictEqual(blockValue(firstBlock('Depends:\n a,\n b\n')), 'a, b');
    assert.strictEqual(blockValue(firstBlock('Depends:\n')), '');
  });
});

describe('interpretControl', () => {

  it('should map the fixture onto source and binary packages', () => {
    const fixturePath = path.join(__dirname, 'fixtures', 'sample.control');
    const { document } = parse(fs.readFileSync(fixturePath, 'utf-8'));

    const { status, control } = interpretControl(document);

    assert.ok(status.ok);
    assert.strictEqual(control.source?.name, 'libexample');
    assert.strictEqual(control.source?.fields.get('Build-Depends'), 'debhelper (>= 9), perl');
    assert.strictEqual(control.source?.fields.has('Source'), false);
    assert.strictEqual(control.binaries.length, 1);
    assert.strictEqual(control.binaries[0].name, 'libexample-perl');
    assert.strictEqual(control.binaries[0].context.line, 10);
    assert.strictEqual(control.binaries[0].fields.get('Depends'), '${misc:Depends}, ${perl:Depends}');
  });

  it('should skip empty sections', () => {
    const { document } = parse('Source: foo\n\n');
    const { status, control } = interpretControl(document);

    assert.ok(status.ok);
    assert.strictEqual(control.source?.name, 'foo');
    assert.strictEqual(control.binaries.length, 0);
  });

  it('should require a Source field in the first paragraph', () => {
    const { document, criticals } = parse('Package: foo\n');
    const { status, control } = interpretControl(document);

    assert.ok(!status.ok);
    assert.strictEqual(status.error.kind, 'SyntaxError');
    assert.strictEqual(control.source, undefined);
    assert.deepStrictEqual(criticals, ["critical error: Paragraph is missing its 'Source' field at test line 1"]);
  });

  it('should require a Package field in later paragraphs', () => {
    const { document } = parse('Source: foo\n\nArchitecture: any\n');
    const { status, control } = interpretControl(document);

    assert.ok(!status.ok);
    assert.strictEqual(status.error.message, "Paragraph is missing its 'Package' field");
    assert.strictEqual(control.source?.name, 'foo');
  });

  it('should reject invalid package names', () => {
    const { document, criticals } = parse('Source: Foo\n');
    const { status } = interpretControl(document);

    assert.ok(!status.ok);
    assert.ok(status.error instanceof PackageNameError);
    assert.strictEqual(status.error.rule, 'bad-prefix');
    assert.strictEqual(status.error.packageName, 'Foo');
    assert.deepStrictEqual(criticals, [
      "critical error: Package name 'Foo' must begin with a lowercase letter or a digit at test line 1"
    ]);
  });
});
