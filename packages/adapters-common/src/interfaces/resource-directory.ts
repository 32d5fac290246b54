import type { OperationOptions } from "../types/secret";

/**
 * Interface for looking up management-plane resources.
 * Implemented by Azure ResourceDirectoryService.
 */
export interface IResourceDirectory {
  /**
   * Find the resource ID of a key vault by its exact name.
   * @param subscriptionId - Subscription to search in
   * @param vaultName - Vault name (first DNS label of the vault URL)
   * @throws ProviderError NOT_FOUND when no vault of that name is visible
   */
  findKeyVaultId(
    subscriptionId: string,
    vaultName: string,
    options?: OperationOptions
  ): Promise<string>;
}
