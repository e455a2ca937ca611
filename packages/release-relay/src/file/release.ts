/**
 * Release publishing: create the release, then attach the build asset.
 */

import { basename } from 'node:path';

import type {
  OperationLogger,
  Outcome,
  ReleaseRecord,
  ReleaseRepository,
  Version,
} from '../lib/types.js';
import { attempt, noopLogger } from '../lib/types.js';

export interface PublishOptions {
  version: Version;
  isDraft: boolean;
  /** Skip the asset upload entirely */
  skipAsset: boolean;
  assetPath: string;
  /** Name shown on the release (default: basename of assetPath) */
  assetName?: string;
  logger?: OperationLogger;
}

export interface PublishResult {
  release: ReleaseRecord;
  /** `null` when the upload was skipped. A failed upload is always fatal. */
  asset: Outcome<void> | null;
}

/**
 * Create a release and upload its asset unless skipped.
 *
 * Release creation failures propagate. An asset failure does not throw: the
 * release already exists, so its id is returned alongside a fatal outcome
 * and the caller decides how to end the run.
 */
export async function publishRelease(
  repository: ReleaseRepository,
  options: PublishOptions,
): Promise<PublishResult> {
  const logger = options.logger ?? noopLogger;

  logger.progress(`Creating ${options.isDraft ? 'draft ' : ''}release ${options.version}`);
  const release = await repository.createRelease(options.version, options.isDraft);
  logger.info(`Created release ${release.tagName} with ID ${release.id}`);

  if (options.skipAsset) {
    logger.debug('Skipping release asset upload');
    return { release, asset: null };
  }

  const assetName = options.assetName ?? basename(options.assetPath);
  logger.progress(`Uploading ${assetName}`);
  const asset = await attempt(
    () => repository.uploadAsset(release, options.assetPath, assetName),
    'fatal',
  );
  return { release, asset };
}
