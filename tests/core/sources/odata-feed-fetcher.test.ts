import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { strToU8 } from 'fflate';
import { SourceError } from '../../../src/utils/errors.js';
import { ODataFeedFetcher } from '../../../src/core/sources/odata-feed-fetcher.js';
import { formatVersion } from '../../../src/core/version/package-version.js';
import { InMemoryTransport, v, versionTexts } from '../../test-helpers.js';

const BASE = 'https://feed.test/api/v2/';

interface EntryOptions {
  dependencies?: string;
  src?: string;
}

function entry(id: string, version: string, options: EntryOptions = {}): string {
  const content = options.src ? `<content type="application/zip" src="${options.src}" />` : '';
  return `<entry><title type="text">${id}</title>${content}<m:properties><d:Version>${version}</d:Version><d:Dependencies>${options.dependencies ?? ''}</d:Dependencies></m:properties></entry>`;
}

function feed(...entries: string[]): string {
  return `<feed xmlns="http://www.w3.org/2005/Atom">${entries.join('')}</feed>`;
}

function findById(id: string): string {
  return `${BASE}FindPackagesById()?id='${id}'&$top=1000`;
}

function createFetcher(transport: InMemoryTransport, updateBatchSize?: number): ODataFeedFetcher {
  return new ODataFeedFetcher({ sourceName: 'v2', url: 'https://feed.test/api/v2', transport, updateBatchSize });
}

describe('OData feed fetcher', () => {
  it('lists versions through FindPackagesById', async () => {
    const transport = new InMemoryTransport().route(findById('Foo'), feed(entry('Foo', '1.0.0'), entry('Foo', '1.1.0')));
    assert.deepEqual(versionTexts(await createFetcher(transport).listVersions('Foo')), ['1.0.0', '1.1.0']);
  });

  it('treats a 404 as an unknown package', async () => {
    assert.deepEqual(await createFetcher(new InMemoryTransport()).listVersions('Missing'), []);
  });

  it('escapes quotes in ids', async () => {
    const transport = new InMemoryTransport();
    await createFetcher(transport).listVersions("O'Brien");
    assert.deepEqual(transport.requests, [`${BASE}FindPackagesById()?id='O''Brien'&$top=1000`]);
  });

  it('fails on server errors', async () => {
    const transport = new InMemoryTransport().route(findById('Foo'), 'oops', 500);
    await assert.rejects(createFetcher(transport).listVersions('Foo'), (error: unknown) => {
      assert.ok(error instanceof SourceError);
      assert.equal(error.message, `Source 'v2': GET ${findById('Foo')} returned 500`);
      return true;
    });
  });

  it('fetches dependency groups of one version', async () => {
    const transport = new InMemoryTransport().route(
      `${BASE}Packages(Id='Foo',Version='1.0.0')`,
      feed(entry('Foo', '1.0.0', { dependencies: 'Bar:[1.0,2.0):netstandard2.0' }))
    );
    const groups = await createFetcher(transport).fetchDependencyGroups('Foo', v('1.0'));
    assert.equal(groups.length, 1);
    assert.equal(groups[0]?.platformProfileLabel, 'netstandard2.0');
    assert.equal(groups[0]?.dependencies[0]?.name, 'Bar');
  });

  it('fails for versions the feed does not have', async () => {
    await assert.rejects(createFetcher(new InMemoryTransport()).fetchDependencyGroups('Foo', v('1.0')), SourceError);
  });

  it('builds the search query', async () => {
    const url =
      `${BASE}Search()?$filter=IsLatestVersion&$orderby=DownloadCount desc&$skip=40&$top=20` +
      `&searchTerm='json'&targetFramework=''&includePrerelease=false`;
    const transport = new InMemoryTransport().route(url, feed(entry('Json.Tools', '3.0.0')));
    const results = await createFetcher(transport).search({ term: 'json', includePrerelease: false, pageSize: 20, pageOffset: 40 });
    assert.deepEqual(results.map((summary) => summary.id), ['Json.Tools']);
  });

  it('batches GetUpdates and falls back to per-package listings on 404', async () => {
    const updates =
      `${BASE}GetUpdates()?packageIds='A%7CB'&versions='1.0.0%7C2.0.0'` +
      `&includePrerelease=false&targetFrameworks=''&versionConstraints=''&includeAllVersions=true`;
    const transport = new InMemoryTransport()
      .route(updates, feed(entry('A', '1.1.0'), entry('B', '2.5.0')))
      .route(findById('C'), feed(entry('C', '3.0.0'), entry('C', '3.1.0')));

    const summaries = await createFetcher(transport, 2).lookupBatch(
      [
        { id: 'A', version: v('1.0') },
        { id: 'B', version: v('2.0') },
        { id: 'C', version: v('3.0') }
      ],
      false
    );

    assert.deepEqual(
      summaries.map((summary) => `${summary.id} ${formatVersion(summary.version)}`),
      ['A 1.1.0', 'B 2.5.0', 'C 3.0.0', 'C 3.1.0']
    );
    assert.equal(transport.requests.length, 3);
    assert.equal(transport.requests[2], findById('C'));
  });

  it('downloads from the entry content link', async () => {
    const transport = new InMemoryTransport()
      .route(`${BASE}Packages(Id='Foo',Version='1.0.0')`, feed(entry('Foo', '1.0.0', { src: 'https://cdn.test/foo.1.0.0.nupkg' })))
      .route('https://cdn.test/foo.1.0.0.nupkg', strToU8('archive'));
    assert.deepEqual(await createFetcher(transport).download('Foo', v('1.0.0')), strToU8('archive'));
  });

  it('downloads from the package endpoint without an entry', async () => {
    const transport = new InMemoryTransport().route(`${BASE}package/Foo/1.0.0`, strToU8('archive'));
    assert.deepEqual(await createFetcher(transport).download('Foo', v('1.0')), strToU8('archive'));
  });
});
