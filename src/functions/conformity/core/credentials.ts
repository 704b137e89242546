/**
 * Credential provider selection.
 */

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import { defaultProvider } from '@aws-sdk/credential-provider-node';
import { fromSSO } from '@aws-sdk/credential-provider-sso';
import type { CredentialSettings } from '@shared/types';

/**
 * Pick the credentials provider described by the configuration.
 *
 * An SSO profile wins when configured; otherwise the SDK's default Node chain
 * (environment, shared ini files, container and instance metadata) is used.
 */
export function resolveCredentials(settings?: CredentialSettings): AwsCredentialIdentityProvider {
  if (settings?.profile) {
    return fromSSO({ profile: settings.profile });
  }
  return defaultProvider();
}
