import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, readBinaryFile, writeBinaryFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { nameKey } from '../version/package-identifier.js';
import { formatVersion, type SemanticVersion } from '../version/package-version.js';

/**
 * Downloaded archives kept across runs, one `<id>.<version>.nupkg` per exact
 * version (lowercased). Shared by every project on the machine.
 */
export class PackageCache {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathFor(name: string, version: SemanticVersion): string {
    const fileName = `${nameKey(name)}.${formatVersion(version).toLowerCase()}${FILE_PATTERNS.PACKAGE_ARCHIVE}`;
    return join(this.directory, fileName);
  }

  async read(name: string, version: SemanticVersion): Promise<Uint8Array | undefined> {
    const path = this.pathFor(name, version);
    if (!(await exists(path))) {
      return undefined;
    }
    logger.debug(`Found ${name} ${formatVersion(version)} in the cache: ${path}`);
    return readBinaryFile(path);
  }

  async store(name: string, version: SemanticVersion, archive: Uint8Array): Promise<void> {
    await writeBinaryFile(this.pathFor(name, version), archive);
  }
}
