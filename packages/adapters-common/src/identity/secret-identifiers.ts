/**
 * Identity Codec
 *
 * Parses and derives vault names, secret names and versions from the two
 * identifier families Key Vault uses:
 *
 * - management-plane vault resource IDs
 *   (/subscriptions/{s}/resourceGroups/{g}/providers/Microsoft.KeyVault/vaults/{vault})
 * - data-plane secret URIs
 *   (https://{vault}.vault.azure.net/secrets/{name}/{version})
 *
 * The vault DNS suffix is not fixed so sovereign clouds
 * (vault.azure.cn, vault.usgovcloudapi.net, ...) parse the same way.
 */

import { ProviderError, ProviderErrorType } from "../errors/provider-error";

export const KEY_VAULT_ID_PATTERN =
  /^\/subscriptions\/[^/]+\/resourceGroups\/[^/]+\/providers\/Microsoft\.KeyVault\/vaults\/([^/]+)$/;

export const SECRET_ID_PATTERN = /^https:\/\/([^./]+)\.[^/]+\/secrets\/([^/]+)/;

const FULL_SECRET_ID_PATTERN = /^(https:\/\/([^./]+)\.[^/]+)\/secrets\/([^/]+)(?:\/([^/]+))?\/?$/;

export const DEFAULT_VAULT_DNS_SUFFIX = "vault.azure.net";

/**
 * Components of a data-plane secret URI.
 */
export interface ParsedSecretId {
  /** https://{vault}.{suffix} */
  vaultUrl: string;
  vaultName: string;
  name: string;
  /** Absent for a versionless URI */
  version?: string;
  /** {vaultUrl}/secrets/{name} */
  versionlessId: string;
}

export function isKeyVaultId(value: string): boolean {
  return KEY_VAULT_ID_PATTERN.test(value);
}

/**
 * Extract the vault name from a vault resource ID.
 * @throws ProviderError INVALID_IDENTIFIER
 */
export function deriveVaultName(keyVaultId: string): string {
  const matches = KEY_VAULT_ID_PATTERN.exec(keyVaultId);
  if (!matches) {
    throw new ProviderError(
      `invalid key vault ID: "${keyVaultId}" doesn't match "${KEY_VAULT_ID_PATTERN.source}"`,
      ProviderErrorType.INVALID_IDENTIFIER
    );
  }
  return matches[1];
}

/**
 * Extract the vault name and secret name from a secret URI.
 * Anything after the secret name (version, trailing slash) is ignored.
 * @throws ProviderError INVALID_IDENTIFIER
 */
export function deriveVaultAndSecretName(secretId: string): { vaultName: string; name: string } {
  const matches = SECRET_ID_PATTERN.exec(secretId);
  if (!matches) {
    throw new ProviderError(
      `invalid ID: "${secretId}" doesn't match "${SECRET_ID_PATTERN.source}"`,
      ProviderErrorType.INVALID_IDENTIFIER
    );
  }
  return { vaultName: matches[1], name: matches[2] };
}

/**
 * Split a versioned or versionless secret URI into its parts.
 * @throws ProviderError INVALID_IDENTIFIER
 */
export function parseSecretId(secretId: string): ParsedSecretId {
  const matches = FULL_SECRET_ID_PATTERN.exec(secretId);
  if (!matches) {
    throw new ProviderError(
      `invalid secret ID: "${secretId}" is not of the form https://{vault}.{suffix}/secrets/{name}[/{version}]`,
      ProviderErrorType.INVALID_IDENTIFIER
    );
  }

  const [, vaultUrl, vaultName, name, version] = matches;
  return {
    vaultUrl,
    vaultName,
    name,
    version,
    versionlessId: `${vaultUrl}/secrets/${name}`,
  };
}

export function buildVaultUrl(vaultName: string, dnsSuffix = DEFAULT_VAULT_DNS_SUFFIX): string {
  return `https://${vaultName}.${dnsSuffix}`;
}
