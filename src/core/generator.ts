/**
 * Artifact Generator
 *
 * Resolves settings for a run and renders them, together with the digest
 * that identifies the settings independently of the header timestamp.
 */

import { computeContentHash } from '../lib/hash.js';
import { resolveSettings } from './engine.js';
import { renderBody, renderSettings } from './render.js';
import type { HardwareFacts, Profile, ResolvedSettings } from './types.js';

/**
 * Everything needed to produce one artifact
 */
export interface GenerateRequest {
  facts: HardwareFacts;
  profile: Profile;
  disableIpv6: boolean;
  installPath: string;
  /** Header timestamp (default: now) */
  generatedAt?: Date;
}

/**
 * A rendered artifact ready to be written or printed
 */
export interface GeneratedArtifact {
  resolved: ResolvedSettings;
  /** Full file content, header included */
  content: string;
  /** SHA256 prefix of the `key = value` lines only */
  digest: string;
}

export function generateArtifact(request: GenerateRequest): GeneratedArtifact {
  const resolved = resolveSettings(request.facts, request.profile, {
    disableIpv6: request.disableIpv6,
  });

  const content = renderSettings(resolved, {
    installPath: request.installPath,
    generatedAt: request.generatedAt,
  });

  return {
    resolved,
    content,
    digest: computeContentHash(renderBody(resolved).join('\n')),
  };
}
