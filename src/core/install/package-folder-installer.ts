import { join } from 'path';
import type { NuforgeError } from '../../types/index.js';
import { errorMessage, FileSystemError, InstallStepError } from '../../utils/errors.js';
import { isDirectory, listDirectories, listFiles, readBinaryFile, remove, writeBinaryFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { fail, ok, type Result } from '../../utils/result.js';
import { parsePackageFileName } from '../sources/local-feed-fetcher.js';
import { readArchiveManifest } from '../sources/package-archive.js';
import type { PackageSource } from '../sources/package-source.js';
import type { PackageMetadata } from '../sources/types.js';
import { identifierFromVersion, installFolderName, type PackageIdentifier } from '../version/package-identifier.js';
import { formatVersion, type SemanticVersion } from '../version/package-version.js';
import type { PackageCache } from './package-cache.js';
import type { InstallerPort } from './types.js';

const IGNORED_FOLDERS = new Set(['.svn', '.git']);

export interface PackageFolderInstallerOptions {
  /** Install root that uninstall and listing operate on. */
  root: string;
  /** Sources archives are downloaded from, matched by `sourceRef`. */
  sources: readonly PackageSource[];
  /** Checked before every download and filled after it. */
  cache?: PackageCache;
}

/**
 * Installs a package as `<root>/<Name>.<Version>/<Name>.<Version>.nupkg`.
 * Archives are stored as downloaded; nothing is extracted.
 */
export class PackageFolderInstaller implements InstallerPort {
  private readonly root: string;
  private readonly sources: readonly PackageSource[];
  private readonly cache?: PackageCache;

  constructor(options: PackageFolderInstallerOptions) {
    this.root = options.root;
    this.sources = options.sources;
    this.cache = options.cache;
  }

  async install(metadata: PackageMetadata, installRoot: string): Promise<Result<void, InstallStepError>> {
    const name = metadata.identifier.name;
    const source = this.sources.find((candidate) => candidate.name === metadata.sourceRef);
    if (!source) {
      return fail(new InstallStepError(name, 'install', `source '${metadata.sourceRef}' is not configured`));
    }

    const folderName = installFolderName(metadata.identifier);
    try {
      const archive = await this.fetchArchive(source, name, metadata.version);
      await writeBinaryFile(join(installRoot, folderName, `${folderName}.nupkg`), archive);
      logger.debug(`Installed ${folderName} into ${installRoot}`);
      return ok(undefined);
    } catch (error) {
      return fail(new InstallStepError(name, 'install', errorMessage(error)));
    }
  }

  private async fetchArchive(source: PackageSource, name: string, version: SemanticVersion): Promise<Uint8Array> {
    if (!this.cache) {
      return source.download(name, version);
    }

    try {
      const cached = await this.cache.read(name, version);
      if (cached) {
        return cached;
      }
    } catch (error) {
      logger.warn(`Ignoring cached ${name} ${formatVersion(version)}: ${errorMessage(error)}`);
    }

    const archive = await source.download(name, version);
    try {
      await this.cache.store(name, version, archive);
    } catch (error) {
      logger.warn(`Cannot cache ${name} ${formatVersion(version)}: ${errorMessage(error)}`);
    }
    return archive;
  }

  async uninstall(identifier: PackageIdentifier): Promise<Result<void, InstallStepError>> {
    try {
      await remove(join(this.root, installFolderName(identifier)));
      return ok(undefined);
    } catch (error) {
      return fail(new InstallStepError(identifier.name, 'uninstall', errorMessage(error)));
    }
  }

  /**
   * Folders under the root that hold their own archive. Anything else,
   * version-control folders included, is ignored. The identity comes from the
   * archive's nuspec, since `<Name>.<Version>` cannot be split reliably when
   * the id ends in numeric segments; the folder name is the fallback.
   */
  async listInstalled(): Promise<Result<PackageIdentifier[], NuforgeError>> {
    if (!(await isDirectory(this.root))) {
      return ok([]);
    }

    try {
      const installed: PackageIdentifier[] = [];
      for (const folder of await listDirectories(this.root)) {
        if (IGNORED_FOLDERS.has(folder.toLowerCase())) continue;

        const archiveName = `${folder}.nupkg`;
        const files = await listFiles(join(this.root, folder));
        const archiveFile = files.find((file) => file.toLowerCase() === archiveName.toLowerCase());
        if (!archiveFile) {
          logger.debug(`Skipping ${folder}: no ${archiveName} inside`);
          continue;
        }

        const nuspec = readArchiveManifest(await readBinaryFile(join(this.root, folder, archiveFile)), archiveFile);
        if (nuspec && nuspec.version.isValid) {
          installed.push(identifierFromVersion(nuspec.id, nuspec.version));
          continue;
        }
        const parsed = parsePackageFileName(archiveName);
        if (!parsed) {
          logger.debug(`Skipping ${folder}: not a <id>.<version> folder`);
          continue;
        }
        installed.push(identifierFromVersion(parsed.id, parsed.version));
      }
      return ok(installed);
    } catch (error) {
      return fail(new FileSystemError(`cannot scan ${this.root}: ${errorMessage(error)}`, { root: this.root }));
    }
  }
}
