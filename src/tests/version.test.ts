import * as test from 'node:test';
import * as assert from 'node:assert';
import { formatVersion, parseVersion } from '../version.js';

const { describe, it } = test;

describe('parseVersion', () => {

  it('should parse a bare upstream version', () => {
    const result = parseVersion('1.2.3');

    assert.ok(result.ok);
    assert.deepStrictEqual(result.value, { epoch: 0, upstream: '1.2.3' });
  });

  it('should parse epoch and revision', () => {
    const result = parseVersion('2:1.0-3');

    assert.ok(result.ok);
    assert.deepStrictEqual(result.value, { epoch: 2, upstream: '1.0', revision: '3' });
  });

  it('should split the revision at the last hyphen', () => {
    const result = parseVersion('1.0-beta-2ubuntu1');

    assert.ok(result.ok);
    assert.strictEqual(result.value.upstream, '1.0-beta');
    assert.strictEqual(result.value.revision, '2ubuntu1');
  });

  it('should take the epoch from the first colon only', () => {
    const result = parseVersion('1:2:3');

    assert.ok(result.ok);
    assert.deepStrictEqual(result.value, { epoch: 1, upstream: '2:3' });
  });

  it('should reject a non-numeric epoch', () => {
    const result = parseVersion('x:1.0');

    assert.ok(!result.ok);
    assert.strictEqual(result.error.kind, 'ParameterError');
    assert.strictEqual(result.error.message, "Version epoch 'x' is not a number");
  });

  it('should treat an empty epoch as zero', () => {
    const result = parseVersion(':1.0');

    assert.ok(result.ok);
    assert.deepStrictEqual(result.value, { epoch: 0, upstream: '1.0' });
  });

  it('should reject an epoch that does not fit a safe integer', () => {
    const result = parseVersion('12345678901234567890:1.0-1');

    assert.ok(!result.ok);
    assert.strictEqual(result.error.kind, 'ParameterError');
    assert.strictEqual(result.error.message, "Version epoch '12345678901234567890' is too large");
  });

  it('should keep the largest safe epoch exact', () => {
    const result = parseVersion('9007199254740991:1.0-1');

    assert.ok(result.ok);
    assert.strictEqual(result.value.epoch, Number.MAX_SAFE_INTEGER);
    assert.strictEqual(formatVersion(result.value), '9007199254740991:1.0-1');
  });
});

describe('formatVersion', () => {

  it('should rebuild the version string', () => {
    assert.strictEqual(formatVersion({ epoch: 2, upstream: '1.0', revision: '3' }), '2:1.0-3');
  });

  it('should omit a zero epoch and a missing revision', () => {
    assert.strictEqual(formatVersion({ epoch: 0, upstream: '1.0' }), '1.0');
  });
});
