import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { homedir, tmpdir } from 'os';
import {
  ConfigManager,
  expandEnvironment,
  parseConfig,
  profileFromConfig,
  resolveCacheDirectory
} from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';

const ENV = { FEED_TOKEN: 'test-secret', FEED_HOST: 'feed.test' };

describe('config', () => {
  let tempDir: string;

  before(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'nuforge-config-'));
  });

  after(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Parsing
  // ==========================================================================

  it('expands both environment syntaxes and leaves unknown names alone', () => {
    assert.equal(expandEnvironment('%FEED_TOKEN%/${FEED_HOST}/%MISSING%', ENV), 'test-secret/feed.test/%MISSING%');
  });

  it('fills in defaults for an empty document', () => {
    const config = parseConfig({}, ENV);
    assert.equal(config.repositoryPath, 'Packages');
    assert.equal(config.manifestPath, 'packages.yml');
    assert.equal(config.timeoutMs, 30000);
    assert.equal(config.installFromCache, true);
    assert.equal(config.cachePath, undefined);
    assert.deepEqual(config.sources, [
      { name: 'nuget.org', source: 'https://api.nuget.org/v3/index.json', protocolVersion: '3' }
    ]);
    assert.deepEqual(profileFromConfig(config), {
      nativeLabel: 'unity',
      hostVersion: '2021.3.0',
      compatibility: 'standard-runtime'
    });
  });

  it('reads sources with expanded credentials', () => {
    const config = parseConfig(
      {
        sources: [
          {
            name: 'private',
            source: 'https://${FEED_HOST}/v3/index.json',
            username: 'ci',
            password: '%FEED_TOKEN%',
            enabled: false,
            updateBatchSize: 10
          }
        ]
      },
      ENV
    );
    const [source] = config.sources;
    assert.equal(config.sources.length, 1);
    assert.equal(source?.source, 'https://feed.test/v3/index.json');
    assert.equal(source?.password, 'test-secret');
    assert.equal(source?.username, 'ci');
    assert.equal(source?.enabled, false);
    assert.equal(source?.updateBatchSize, 10);
    assert.equal(source?.protocolVersion, undefined);
  });

  it('picks the cache directory from config, then environment, then home', () => {
    const cwd = join(tempDir, 'project');
    const configured = parseConfig({ cachePath: '${FEED_HOST}/cache', installFromCache: false }, ENV);
    assert.equal(configured.installFromCache, false);
    assert.equal(resolveCacheDirectory(configured, cwd, { NUFORGE_CACHE_PATH: '/shared/cache' }), join(cwd, 'feed.test', 'cache'));

    const unconfigured = parseConfig({}, ENV);
    assert.equal(resolveCacheDirectory(unconfigured, cwd, { NUFORGE_CACHE_PATH: '/shared/cache' }), '/shared/cache');
    assert.equal(resolveCacheDirectory(unconfigured, cwd, {}), join(homedir(), '.nuforge', 'cache'));
  });

  it('reads the profile section', () => {
    const config = parseConfig({ profile: { hostVersion: '2019.4.0', compatibility: 'legacy-runtime' } }, ENV);
    assert.deepEqual(profileFromConfig(config), {
      nativeLabel: 'unity',
      hostVersion: '2019.4.0',
      compatibility: 'legacy-runtime'
    });
  });

  it('rejects invalid documents', () => {
    const cases: Array<[unknown, string]> = [
      [[], 'Configuration must be a JSON object'],
      [{ sources: {} }, 'sources must be an array'],
      [{ sources: [{ name: 'x' }] }, "sources[0] needs both 'name' and 'source'"],
      [{ sources: ['x'] }, 'sources[0] must be an object'],
      [{ sources: [{ name: 'x', source: 'y', enabled: 'yes' }] }, 'sources[0].enabled must be true or false'],
      [{ profile: { compatibility: 'x' } }, "profile.compatibility must be 'legacy-runtime' or 'standard-runtime', got 'x'"],
      [{ timeoutMs: 0 }, 'config.timeoutMs must be a positive integer'],
      [{ repositoryPath: 42 }, 'config.repositoryPath must be a string'],
      [{ installFromCache: 'no' }, 'config.installFromCache must be true or false']
    ];
    for (const [raw, message] of cases) {
      assert.throws(
        () => parseConfig(raw, ENV),
        (error: unknown) => error instanceof ConfigError && error.message === message,
        message
      );
    }
  });

  // ==========================================================================
  // ConfigManager
  // ==========================================================================

  it('uses defaults when no config file exists', async () => {
    const cwd = join(tempDir, 'empty');
    await mkdir(cwd, { recursive: true });
    const manager = new ConfigManager(cwd, ENV);

    assert.throws(() => manager.getProfile(), /Configuration has not been loaded/);
    const config = await manager.load();
    assert.equal(config.sources[0]?.name, 'nuget.org');
    assert.equal(manager.getConfigFilePath(), null);
    assert.equal(manager.resolvePath(config.repositoryPath), join(cwd, 'Packages'));
    assert.equal(manager.getProfile().nativeLabel, 'unity');
  });

  it('loads a commented JSONC file', async () => {
    const cwd = join(tempDir, 'jsonc');
    await mkdir(cwd, { recursive: true });
    await writeFile(
      join(cwd, 'nuforge.jsonc'),
      `{
  // project feeds
  "repositoryPath": "Assets/Packages",
  "sources": [
    { "name": "local", "source": "./feed", },
  ],
  /* target */
  "profile": { "nativeLabel": "Unity", "hostVersion": "2022.3.0" },
}
`
    );

    const manager = new ConfigManager(cwd, ENV);
    const config = await manager.load();
    assert.equal(manager.getConfigFilePath(), join(cwd, 'nuforge.jsonc'));
    assert.equal(config.repositoryPath, 'Assets/Packages');
    assert.deepEqual(
      config.sources.map((source) => [source.name, source.source]),
      [['local', './feed']]
    );
    assert.equal(manager.resolvePath('/abs/path'), '/abs/path');
    assert.equal(manager.getProfile().hostVersion, '2022.3.0');
    assert.equal(await manager.load(), config);
  });

  it('reports unparseable files as config errors', async () => {
    const cwd = join(tempDir, 'broken');
    await mkdir(cwd, { recursive: true });
    await writeFile(join(cwd, 'nuforge.json'), '{ "sources": [ ');

    await assert.rejects(new ConfigManager(cwd, ENV).load(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.match(error.message, /^Failed to load configuration from .*nuforge\.json: Failed to parse JSON\/JSONC file/);
      return true;
    });
  });
});
