import { isAbsolute, resolve } from 'path';
import type { SourceConfig, SourceProtocol } from '../../types/index.js';
import { LocalFeedFetcher } from './local-feed-fetcher.js';
import { ODataFeedFetcher } from './odata-feed-fetcher.js';
import { PackageSource } from './package-source.js';
import { ServiceIndexFeedFetcher } from './service-index-feed-fetcher.js';
import { createFetchTransport, type FetchTransportOptions, type RemoteTransport } from './transport.js';
import type { FeedFetcher } from './types.js';

export interface SourceFactoryOptions {
  /** Directory relative local feed paths resolve against. */
  cwd: string;
  timeoutMs: number;
  createTransport?: (options: FetchTransportOptions) => RemoteTransport;
}

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

export function detectProtocol(config: SourceConfig): SourceProtocol {
  if (!isRemoteLocation(config.source)) {
    return 'local';
  }
  if (config.protocolVersion === '3' || /index\.json$/i.test(config.source)) {
    return 'v3';
  }
  return 'v2';
}

function createFetcher(config: SourceConfig, options: SourceFactoryOptions): FeedFetcher {
  const protocol = detectProtocol(config);
  if (protocol === 'local') {
    const path = isAbsolute(config.source) ? config.source : resolve(options.cwd, config.source);
    return new LocalFeedFetcher({ sourceName: config.name, path });
  }

  const transport = (options.createTransport ?? createFetchTransport)({
    sourceName: config.name,
    username: config.username,
    password: config.password,
    timeoutMs: options.timeoutMs
  });

  if (protocol === 'v3') {
    return new ServiceIndexFeedFetcher({
      sourceName: config.name,
      url: config.source,
      transport,
      updateBatchSize: config.updateBatchSize,
      supportsPackageIdSearchFilter: config.supportsPackageIdSearchFilter
    });
  }

  return new ODataFeedFetcher({
    sourceName: config.name,
    url: config.source,
    transport,
    updateBatchSize: config.updateBatchSize
  });
}

export function createPackageSource(config: SourceConfig, options: SourceFactoryOptions): PackageSource {
  return new PackageSource({
    name: config.name,
    enabled: config.enabled ?? true,
    fetcher: createFetcher(config, options)
  });
}

export function createPackageSources(configs: readonly SourceConfig[], options: SourceFactoryOptions): PackageSource[] {
  return configs.map((config) => createPackageSource(config, options));
}
