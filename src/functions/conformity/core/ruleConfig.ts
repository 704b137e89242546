/**
 * Validating factory for rule configuration.
 */

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { RuleConfig } from '@shared/types';
import { resolveCredentials } from './credentials';
import { ConfigValidationError } from './errors';

/**
 * Build the immutable configuration of a rule.
 *
 * Tag names are trimmed and deduplicated in first-seen order. A missing list, a
 * null element or a blank name fails with {@link ConfigValidationError}.
 *
 * @param requiredTags - Tag keys every eligible instance must carry
 * @param credentials - Provider for the cloud calls; defaults to the SDK's default chain
 */
export function createRuleConfig(
  requiredTags: ReadonlyArray<string | null | undefined> | null | undefined,
  credentials?: AwsCredentialIdentityProvider
): RuleConfig {
  if (requiredTags == null) {
    throw new ConfigValidationError('requiredTags must not be null');
  }

  const tags = new Set<string>();
  requiredTags.forEach((tagName, index) => {
    if (tagName == null) {
      throw new ConfigValidationError(`requiredTags[${index}] must not be null`);
    }
    const trimmed = tagName.trim();
    if (trimmed.length === 0) {
      throw new ConfigValidationError(`requiredTags[${index}] must not be blank`);
    }
    tags.add(trimmed);
  });

  return Object.freeze({
    requiredTags: Object.freeze([...tags]),
    credentials: credentials ?? resolveCredentials(),
  });
}
