/**
 * Validity window and bookkeeping timestamps of one secret version.
 */
export interface SecretAttributes {
  enabled?: boolean;
  /** Not usable before this instant */
  notBefore?: Date;
  /** Not usable after this instant */
  expires?: Date;
  created?: Date;
  updated?: Date;
}

/**
 * Properties of one secret version as reported by the vault.
 * Never carries the secret value.
 */
export interface SecretProperties {
  /** Versioned secret URI, e.g. https://myvault.vault.azure.net/secrets/db-password/0123abcd */
  id: string;
  attributes: SecretAttributes;
  contentType?: string;
  /** Raw tag mapping; values that are not strings fail record conversion */
  tags?: Record<string, string | null | undefined>;
}

/**
 * Metadata written alongside a secret version.
 */
export interface SecretMetadataParameters {
  contentType?: string;
  notBefore?: Date;
  expires?: Date;
  tags?: Record<string, string>;
}

/**
 * Parameters for minting a new secret version.
 */
export interface SetSecretParameters extends SecretMetadataParameters {
  value: string;
}

/**
 * Parameters for changing the metadata of an existing version.
 */
export type UpdateSecretPropertiesParameters = SecretMetadataParameters;

/**
 * Per-call options. The signal is forwarded to every network call.
 */
export interface OperationOptions {
  abortSignal?: AbortSignal;
}
