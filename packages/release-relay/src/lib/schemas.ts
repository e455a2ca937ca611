/**
 * Zod schemas for external data: the asset upload response and the config file.
 *
 * Octokit types the routes it knows. The upload goes to a separate host, so its
 * response is validated here.
 */

import { z } from 'zod';

// =============================================================================
// Asset Upload Response
// =============================================================================

export const UploadedAssetResponse = z.object({
  id: z.number().int(),
  browser_download_url: z.string().optional(),
});

// =============================================================================
// Config File (.release-relay.yml)
// =============================================================================

export const GitIdentitySchema = z
  .object({
    name: z.string().min(1).optional(),
    email: z.string().min(1).optional(),
  })
  .strict();

export const RelayFileConfigSchema = z
  .object({
    owner: z.string().min(1).optional(),
    repo: z.string().min(1).optional(),
    parent_repo: z.string().min(1).optional(),
    submodule_path: z.string().min(1).optional(),
    base_branch: z.string().min(1).optional(),
    asset_path: z.string().min(1).optional(),
    git: GitIdentitySchema.optional(),
  })
  .strict();

export type RelayFileConfig = z.infer<typeof RelayFileConfigSchema>;
