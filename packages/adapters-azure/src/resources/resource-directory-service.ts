/**
 * Azure Resource Directory Service
 *
 * Looks up management-plane resource IDs with the Azure Resource Manager SDK.
 * Used to recover a vault's resource ID from the vault name embedded in a
 * secret URI.
 */

import { ResourceManagementClient } from "@azure/arm-resources";
import { DefaultAzureCredential, TokenCredential } from "@azure/identity";
import { ProviderError, ProviderErrorType, toProviderError } from "@azurekv/adapters-common";
import type { IResourceDirectory, OperationOptions } from "@azurekv/adapters-common";

export const KEY_VAULT_RESOURCE_TYPE = "Microsoft.KeyVault/vaults";

export type ResourceClientFactory = (subscriptionId: string) => ResourceManagementClient;

/**
 * Resource directory backed by ResourceManagementClient.resources.list.
 */
export class ResourceDirectoryService implements IResourceDirectory {
  private readonly createClient: ResourceClientFactory;

  /**
   * @param credential - Optional TokenCredential (defaults to DefaultAzureCredential)
   * @param createClient - Optional client factory, one client per lookup
   */
  constructor(credential?: TokenCredential, createClient?: ResourceClientFactory) {
    this.createClient =
      createClient ??
      ((subscriptionId) =>
        new ResourceManagementClient(credential ?? new DefaultAzureCredential(), subscriptionId));
  }

  /**
   * Find a key vault's resource ID by name within a subscription.
   * The first resource the name filter returns wins.
   */
  async findKeyVaultId(
    subscriptionId: string,
    vaultName: string,
    options: OperationOptions = {}
  ): Promise<string> {
    const client = this.createClient(subscriptionId);
    const filter = `resourceType eq '${KEY_VAULT_RESOURCE_TYPE}' and name eq '${escapeODataString(vaultName)}'`;

    try {
      const iterator = client.resources.list({ filter, abortSignal: options.abortSignal });
      for await (const resource of iterator) {
        if (resource.id) {
          return resource.id;
        }
      }
    } catch (error: unknown) {
      throw toProviderError(error);
    }

    throw new ProviderError(
      `the key vault "${vaultName}" not found`,
      ProviderErrorType.NOT_FOUND,
      undefined,
      [
        `make sure that the key vault name is correct and that you have the "${KEY_VAULT_RESOURCE_TYPE}/read" permission on subscription ${subscriptionId}`,
      ]
    );
  }
}

function escapeODataString(value: string): string {
  return value.replace(/'/g, "''");
}
