/**
 * CLI Context Factory
 *
 * Loads the project configuration and wires the orchestrator with the CLI's
 * output adapter. Every command builds its context through here.
 */

import { ConfigManager } from '../core/config.js';
import { PackageCache } from '../core/install/package-cache.js';
import { PackageFolderInstaller } from '../core/install/package-folder-installer.js';
import { PackageOrchestrator } from '../core/install/orchestrator.js';
import { ManifestStore } from '../core/manifest/manifest-store.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { createOutputProgress } from '../core/ports/output-progress.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PackageSource } from '../core/sources/package-source.js';
import { createPackageSources } from '../core/sources/source-factory.js';
import type { NuforgeConfig } from '../types/index.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions {
  cwd?: string;
  verbose?: boolean;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

export interface CliContext {
  cwd: string;
  config: NuforgeConfig;
  output: OutputPort;
  sources: PackageSource[];
  manifest: ManifestStore;
  installer: PackageFolderInstaller;
  orchestrator: PackageOrchestrator;
}

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export function getCliOutput(interactive?: boolean): OutputPort {
  if (detectInteractive(interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}

export async function createCliContext(options: CliContextOptions = {}): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();
  const configManager = new ConfigManager(cwd);
  const config = await configManager.load();
  const output = getCliOutput(options.interactive);

  const sources = createPackageSources(config.sources, { cwd, timeoutMs: config.timeoutMs });
  const installRoot = configManager.resolvePath(config.repositoryPath);
  const manifest = new ManifestStore(configManager.resolvePath(config.manifestPath));

  const cache = config.installFromCache ? new PackageCache(configManager.cacheDirectory()) : undefined;
  const installer = new PackageFolderInstaller({ root: installRoot, sources, cache });
  const orchestrator = new PackageOrchestrator({
    sources,
    installer,
    manifest,
    profileProvider: configManager,
    installRoot,
    progress: createOutputProgress(output, { verbose: options.verbose })
  });

  return { cwd, config, output, sources, manifest, installer, orchestrator };
}
