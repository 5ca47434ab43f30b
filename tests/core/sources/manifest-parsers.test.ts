import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { strToU8, zipSync } from 'fflate';
import { parseNuspec, parseNuspecDependencies } from '../../../src/core/sources/nuspec-parser.js';
import { parseODataDependencies, parseODataFeed } from '../../../src/core/sources/odata-parser.js';
import { readArchiveManifest, readNuspecText } from '../../../src/core/sources/package-archive.js';
import { formatSpec, formatVersion } from '../../../src/core/version/package-version.js';
import type { DependencyGroup } from '../../../src/core/sources/types.js';
import { buildArchive, nuspecXml } from '../../test-helpers.js';

function describeGroups(groups: DependencyGroup[]): string[] {
  return groups.map(
    (group) =>
      `${group.platformProfileLabel || '*'}: ${group.dependencies.map((dep) => `${dep.name} ${formatSpec(dep.spec)}`).join(', ')}`
  );
}

describe('manifest parsers', () => {
  // ==========================================================================
  // nuspec
  // ==========================================================================

  describe('nuspec', () => {
    it('reads metadata and grouped dependencies', () => {
      const document = parseNuspec(
        nuspecXml({
          id: 'Foo',
          version: '1.2.0-rc.1',
          authors: 'Ann,  Bob ,',
          description: 'Tools &lt;core&gt;',
          groups: [
            ['.NETStandard2.0', [['Bar', '[1.0,2.0)'], ['Baz', '3.1']]],
            ['net48', []]
          ]
        })
      );
      assert.ok(document);
      assert.equal(document.id, 'Foo');
      assert.equal(formatVersion(document.version), '1.2.0-rc.1');
      assert.deepEqual(document.authors, ['Ann', 'Bob']);
      assert.equal(document.description, 'Tools <core>');
      assert.deepEqual(describeGroups(document.dependencyGroups), [
        '.NETStandard2.0: Bar [1.0.0,2.0.0), Baz 3.1.0',
        'net48: '
      ]);
    });

    it('puts ungrouped dependencies in one catch-all group', () => {
      const xml = '<dependencies><dependency id="A" version="1.0" /><dependency id="B" /></dependencies>';
      assert.deepEqual(describeGroups(parseNuspecDependencies('Foo', xml)), ['*: A 1.0.0, B ']);
    });

    it('skips dependencies with unparseable versions', () => {
      const xml = '<dependencies><group targetFramework="net45"><dependency id="A" version="[oops" /><dependency id="B" version="2.0" /></group></dependencies>';
      assert.deepEqual(describeGroups(parseNuspecDependencies('Foo', xml)), ['net45: B 2.0.0']);
    });

    it('has no groups without a dependencies element', () => {
      assert.deepEqual(parseNuspecDependencies('Foo', '<metadata><id>Foo</id></metadata>'), []);
    });

    it('reads CDATA descriptions', () => {
      const document = parseNuspec(
        '<package><metadata><id>Foo</id><version>1.0</version><description><![CDATA[Uses <b>bold</b>]]></description></metadata></package>'
      );
      assert.equal(document?.description, 'Uses <b>bold</b>');
      assert.deepEqual(document?.authors, []);
    });

    it('rejects documents without an id or version', () => {
      assert.equal(parseNuspec('<package><metadata><id>Foo</id></metadata></package>'), undefined);
      assert.equal(parseNuspec('<package></package>'), undefined);
    });
  });

  // ==========================================================================
  // Archives
  // ==========================================================================

  describe('package archives', () => {
    it('reads the nuspec at the archive root only', () => {
      const archive = zipSync({
        'content/Other.nuspec': strToU8('<package><metadata><id>Other</id><version>9.0</version></metadata></package>'),
        'Foo.nuspec': strToU8(nuspecXml({ id: 'Foo', version: '1.0.0' }))
      });
      assert.equal(readArchiveManifest(archive, 'Foo.1.0.0.nupkg')?.id, 'Foo');
    });

    it('returns undefined for archives without a nuspec', () => {
      const archive = zipSync({ 'lib/Foo.dll': strToU8('binary') });
      assert.equal(readNuspecText(archive), undefined);
      assert.equal(readArchiveManifest(archive, 'Foo.1.0.0.nupkg'), undefined);
    });

    it('returns undefined for bytes that are not an archive', () => {
      assert.equal(readArchiveManifest(strToU8('definitely not a zip'), 'broken.nupkg'), undefined);
    });

    it('reads the nuspec text of a built archive', () => {
      const text = readNuspecText(buildArchive(nuspecXml({ id: 'Foo', version: '1.0.0' }), 'foo.NUSPEC'));
      assert.match(text ?? '', /<id>Foo<\/id>/);
    });
  });

  // ==========================================================================
  // OData
  // ==========================================================================

  describe('OData', () => {
    it('groups the id:range:framework notation by framework', () => {
      const groups = parseODataDependencies('Foo', 'Bar:[1.0,2.0):net45|Baz:1.0:net45|::netstandard2.0|Qux:2.0:');
      assert.deepEqual(describeGroups(groups), [
        'net45: Bar [1.0.0,2.0.0), Baz 1.0.0',
        'netstandard2.0: ',
        '*: Qux 2.0.0'
      ]);
    });

    it('has no groups for an empty dependency string', () => {
      assert.deepEqual(parseODataDependencies('Foo', '  '), []);
    });

    it('parses Atom entries', () => {
      const xml = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:d="http://schemas.microsoft.com/ado/2007/08/dataservices" xmlns:m="http://schemas.microsoft.com/ado/2007/08/dataservices/metadata">
  <entry>
    <title type="text">Foo</title>
    <content type="application/zip" src="https://feed.test/api/v2/package/Foo/1.0.0" />
    <m:properties>
      <d:Version>1.0.0</d:Version>
      <d:Title>Foo Library</d:Title>
      <d:Description>Does foo</d:Description>
      <d:Authors>Ann, Bob</d:Authors>
      <d:DownloadCount m:type="Edm.Int32">42</d:DownloadCount>
      <d:Dependencies>Bar:1.0:</d:Dependencies>
    </m:properties>
  </entry>
  <entry>
    <title type="text">Broken</title>
    <m:properties><d:Version>not-a-version</d:Version></m:properties>
  </entry>
  <entry>
    <title type="text">Bare</title>
    <m:properties><d:Version>2.0</d:Version><d:Title></d:Title></m:properties>
  </entry>
</feed>`;
      const entries = parseODataFeed(xml);
      assert.equal(entries.length, 2);

      const [foo, bare] = entries;
      assert.equal(foo?.summary.id, 'Foo');
      assert.equal(foo?.summary.title, 'Foo Library');
      assert.equal(foo?.summary.description, 'Does foo');
      assert.deepEqual(foo?.summary.authors, ['Ann', 'Bob']);
      assert.equal(foo?.summary.downloadCount, 42);
      assert.equal(foo?.downloadUrl, 'https://feed.test/api/v2/package/Foo/1.0.0');
      assert.deepEqual(describeGroups(foo?.dependencyGroups ?? []), ['*: Bar 1.0.0']);

      assert.equal(bare?.summary.id, 'Bare');
      assert.equal(bare?.summary.title, undefined);
      assert.equal(bare?.summary.downloadCount, undefined);
      assert.equal(bare?.downloadUrl, undefined);
      assert.deepEqual(bare?.dependencyGroups, []);
    });
  });
});
