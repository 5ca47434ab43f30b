import { strFromU8, unzipSync } from 'fflate';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { parseNuspec, type NuspecDocument } from './nuspec-parser.js';

function isRootNuspec(name: string): boolean {
  return !name.includes('/') && name.toLowerCase().endsWith('.nuspec');
}

/**
 * Text of the `.nuspec` at the root of a package archive, if any.
 */
export function readNuspecText(archive: Uint8Array): string | undefined {
  const files = unzipSync(archive, { filter: (file) => isRootNuspec(file.name) });
  const name = Object.keys(files).find(isRootNuspec);
  const content = name ? files[name] : undefined;
  return content ? strFromU8(content) : undefined;
}

export function readArchiveManifest(archive: Uint8Array, label: string): NuspecDocument | undefined {
  try {
    const text = readNuspecText(archive);
    if (text === undefined) {
      logger.warn(`${label} contains no .nuspec manifest`);
      return undefined;
    }
    return parseNuspec(text);
  } catch (error) {
    logger.warn(`${label} is not a readable package archive: ${errorMessage(error)}`);
    return undefined;
  }
}
