import { buildVaultUrl, deriveVaultName, DEFAULT_VAULT_DNS_SUFFIX } from "@azurekv/adapters-common";
import type { SecretClient } from "@azure/keyvault-secrets";

export type SecretClientFactory = (vaultUrl: string) => SecretClient;

/**
 * Per-vault SecretClient cache, keyed by vault name.
 *
 * The check-and-insert in get() never awaits, so it runs to completion on the
 * event loop before any other caller can observe the map. Concurrent first use
 * of a vault therefore constructs exactly one client, and no network call is
 * made while the section runs.
 */
export class SecretClientCache {
  private readonly clients = new Map<string, SecretClient>();

  constructor(
    private readonly createClient: SecretClientFactory,
    private readonly dnsSuffix: string = DEFAULT_VAULT_DNS_SUFFIX
  ) {}

  /**
   * Get the client bound to the vault a resource ID names.
   * @throws ProviderError INVALID_IDENTIFIER for a malformed vault ID
   */
  get(keyVaultId: string): SecretClient {
    const vaultName = deriveVaultName(keyVaultId);

    const existing = this.clients.get(vaultName);
    if (existing) {
      return existing;
    }

    const client = this.createClient(buildVaultUrl(vaultName, this.dnsSuffix));
    this.clients.set(vaultName, client);
    return client;
  }

  get size(): number {
    return this.clients.size;
  }
}
