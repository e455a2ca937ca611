/**
 * Pipeline handoff files.
 *
 * Pipeline steps run as separate processes and pass versions through plain
 * text files in the working directory: `current_version.txt` (written by
 * get-version) and `new_version.txt` (written by bump-version). Each holds
 * one version string and nothing else.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { writeFile } from 'atomically';

import type { Version } from '../lib/types.js';

/**
 * Write a version to a handoff file.
 *
 * @returns Absolute path of the written file
 */
export async function writeVersionFile(
  dir: string,
  fileName: string,
  version: Version,
): Promise<string> {
  const path = join(dir, fileName);
  await writeFile(path, version);
  return path;
}

/**
 * Read a version from a handoff file.
 *
 * @returns The trimmed version, or null if the file does not exist or is empty
 */
export async function readVersionFile(dir: string, fileName: string): Promise<Version | null> {
  let content: string;
  try {
    content = await readFile(join(dir, fileName), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  const version = content.trim();
  return version === '' ? null : version;
}
