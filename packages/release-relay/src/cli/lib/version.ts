/**
 * CLI version, read from the package manifest.
 */

import { createRequire } from 'node:module';

function getVersion(): string {
  if (process.env.RELEASE_RELAY_DEV_VERSION) {
    return process.env.RELEASE_RELAY_DEV_VERSION;
  }
  // Same relative location from src/cli/lib and dist/cli/lib
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../../../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'development';
}

export const VERSION = getVersion();
