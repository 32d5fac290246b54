import type {
  OperationOptions,
  SecretProperties,
  SetSecretParameters,
  UpdateSecretPropertiesParameters,
} from "../types/secret";

/**
 * Interface for the vault data-plane operations on secrets.
 * Implemented by Azure KeyVaultSecretsService.
 *
 * Every operation addresses the vault by its resource ID
 * (/subscriptions/.../providers/Microsoft.KeyVault/vaults/{name}).
 */
export interface IVaultSecretsApi {
  /**
   * List the properties of every version of a secret, one array per page.
   * The sequence is finite and cannot be restarted mid-stream.
   */
  listSecretVersions(
    keyVaultId: string,
    name: string,
    options?: OperationOptions
  ): AsyncIterable<SecretProperties[]>;

  /**
   * Store a value, minting a new version.
   * @returns Properties of the new version
   */
  setSecret(
    keyVaultId: string,
    name: string,
    parameters: SetSecretParameters,
    options?: OperationOptions
  ): Promise<SecretProperties>;

  /**
   * Change content type, validity window and tags of an existing version.
   * No new version is created.
   */
  updateSecretProperties(
    keyVaultId: string,
    name: string,
    version: string,
    parameters: UpdateSecretPropertiesParameters,
    options?: OperationOptions
  ): Promise<SecretProperties>;

  /**
   * Delete the secret together with all of its versions.
   */
  deleteSecret(keyVaultId: string, name: string, options?: OperationOptions): Promise<void>;
}
