import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseInstallTarget } from '../../src/commands/install.js';
import { formatRecordLine } from '../../src/commands/list.js';
import { formatSearchLine } from '../../src/commands/search.js';
import { parseCount } from '../../src/commands/shared.js';
import { formatIdentifier } from '../../src/core/version/package-identifier.js';
import { ParseError } from '../../src/utils/errors.js';
import { ident, unwrap, v } from '../test-helpers.js';

describe('command formatting', () => {
  it('accepts the install target forms', () => {
    assert.equal(formatIdentifier(unwrap(parseInstallTarget('Foo@[1.0,2.0)'))), 'Foo.[1.0.0,2.0.0)');
    assert.equal(formatIdentifier(unwrap(parseInstallTarget('Foo', '1.2'))), 'Foo.1.2.0');
    assert.equal(formatIdentifier(unwrap(parseInstallTarget('Foo'))), 'Foo');
    assert.equal(unwrap(parseInstallTarget('Foo', '1.2')).manuallyRequested, true);
    assert.equal(parseInstallTarget('Foo', '[oops').success, false);
  });

  it('formats search results on one line', () => {
    const line = formatSearchLine({
      identifier: ident('Foo', '1.0'),
      version: v('1.0'),
      availableVersions: [],
      authors: [],
      downloadCount: 42,
      description: 'Line one\nLine two',
      sourceRef: 'feed'
    });
    assert.equal(line, 'Foo 1.0.0 [feed] (42 downloads) - Line one');
  });

  it('marks dependencies and missing installs in the listing', () => {
    const onDisk = [ident('Foo', '1.0')];
    assert.equal(formatRecordLine({ name: 'Foo', version: v('1.0'), manuallyInstalled: true }, onDisk), 'Foo@1.0.0');
    assert.equal(
      formatRecordLine({ name: 'Bar', version: v('2.0'), manuallyInstalled: false }, onDisk),
      'Bar@2.0.0\x1b[2m (dependency)\x1b[0m\x1b[31m (missing)\x1b[0m'
    );
  });

  it('parses paging counts', () => {
    assert.equal(parseCount('10', '--take'), 10);
    assert.throws(
      () => parseCount('-1', '--skip'),
      (error: unknown) => error instanceof ParseError && error.message === "Cannot parse '-1': --skip expects a non-negative integer"
    );
  });
});
