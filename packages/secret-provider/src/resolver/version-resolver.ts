/**
 * Version Resolver
 *
 * Locates one version of a secret in the paginated version listing:
 * the version named explicitly, or the most recently created one.
 */

import {
  ProviderError,
  ProviderErrorType,
  parseSecretId,
  toProviderError,
} from "@azurekv/adapters-common";
import type {
  IVaultSecretsApi,
  OperationOptions,
  SecretProperties,
} from "@azurekv/adapters-common";

export const SECRET_READ_PERMISSION = "Microsoft.KeyVault/vaults/secrets/readMetadata/action";

/**
 * Resolve the properties of a secret version.
 *
 * Every page is consumed unless an explicit version is found first. A failed
 * page fetch rejects the whole call; nothing partial is returned.
 *
 * @param version - Exact version to select; empty or absent selects the latest by creation time
 * @throws ProviderError NOT_FOUND when no entry matches
 */
export async function resolveSecretVersion(
  api: IVaultSecretsApi,
  keyVaultId: string,
  name: string,
  version?: string,
  options: OperationOptions = {}
): Promise<SecretProperties> {
  let latest: SecretProperties | undefined;

  try {
    for await (const page of api.listSecretVersions(keyVaultId, name, options)) {
      for (const entry of page) {
        if (version) {
          if (parseSecretId(entry.id).version === version) {
            return entry;
          }
          continue;
        }

        if (isCreatedAfter(entry, latest)) {
          latest = entry;
        }
      }
    }
  } catch (error: unknown) {
    throw toProviderError(error);
  }

  if (!latest) {
    const subject = version ? `the version "${version}" of the secret "${name}"` : `the secret "${name}"`;
    throw new ProviderError(
      `${subject} was not found in the key vault "${keyVaultId}"`,
      ProviderErrorType.NOT_FOUND,
      undefined,
      [`make sure that the secret exists and that you have the "${SECRET_READ_PERMISSION}" permission`]
    );
  }

  return latest;
}

/**
 * Strictly later creation time wins; an entry without one never displaces
 * an entry that has one.
 */
function isCreatedAfter(candidate: SecretProperties, current: SecretProperties | undefined): boolean {
  if (!current) {
    return true;
  }
  const created = candidate.attributes.created;
  if (!created) {
    return false;
  }
  const currentCreated = current.attributes.created;
  return !currentCreated || created.getTime() > currentCreated.getTime();
}
