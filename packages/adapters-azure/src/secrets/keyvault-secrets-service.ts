/**
 * Azure Key Vault Secrets Service
 *
 * Data-plane secret operations backed by @azure/keyvault-secrets.
 * Values are only ever sent to the vault; every result is reduced to
 * SecretProperties, which carry no value.
 */

import { SecretClient } from "@azure/keyvault-secrets";
import type { SecretProperties as KeyVaultSecretProperties } from "@azure/keyvault-secrets";
import { DefaultAzureCredential, TokenCredential } from "@azure/identity";
import {
  ProviderError,
  ProviderErrorType,
  toProviderError,
  DEFAULT_VAULT_DNS_SUFFIX,
} from "@azurekv/adapters-common";
import type {
  IVaultSecretsApi,
  OperationOptions,
  SecretProperties,
  SetSecretParameters,
  UpdateSecretPropertiesParameters,
} from "@azurekv/adapters-common";

import { SecretClientCache, SecretClientFactory } from "./secret-client-cache";

export interface KeyVaultSecretsServiceOptions {
  /** Defaults to DefaultAzureCredential */
  credential?: TokenCredential;
  /** DNS suffix of vault URLs. Default: "vault.azure.net" */
  vaultDnsSuffix?: string;
  /** Override SecretClient construction (tests, custom pipelines) */
  createClient?: SecretClientFactory;
}

export class KeyVaultSecretsService implements IVaultSecretsApi {
  private readonly clients: SecretClientCache;

  constructor(options: KeyVaultSecretsServiceOptions = {}) {
    const createClient =
      options.createClient ?? defaultClientFactory(options.credential ?? new DefaultAzureCredential());
    this.clients = new SecretClientCache(
      createClient,
      options.vaultDnsSuffix ?? DEFAULT_VAULT_DNS_SUFFIX
    );
  }

  async *listSecretVersions(
    keyVaultId: string,
    name: string,
    options: OperationOptions = {}
  ): AsyncGenerator<SecretProperties[]> {
    const client = this.clients.get(keyVaultId);
    const pages = client
      .listPropertiesOfSecretVersions(name, { abortSignal: options.abortSignal })
      .byPage();

    try {
      for await (const page of pages) {
        yield page.map((properties) => toSecretProperties(properties, name));
      }
    } catch (error: unknown) {
      throw toProviderError(error);
    }
  }

  async setSecret(
    keyVaultId: string,
    name: string,
    parameters: SetSecretParameters,
    options: OperationOptions = {}
  ): Promise<SecretProperties> {
    const client = this.clients.get(keyVaultId);

    try {
      const secret = await client.setSecret(name, parameters.value, {
        contentType: parameters.contentType,
        notBefore: parameters.notBefore,
        expiresOn: parameters.expires,
        tags: parameters.tags,
        abortSignal: options.abortSignal,
      });
      return toSecretProperties(secret.properties, name);
    } catch (error: unknown) {
      throw toProviderError(error);
    }
  }

  async updateSecretProperties(
    keyVaultId: string,
    name: string,
    version: string,
    parameters: UpdateSecretPropertiesParameters,
    options: OperationOptions = {}
  ): Promise<SecretProperties> {
    const client = this.clients.get(keyVaultId);

    try {
      const properties = await client.updateSecretProperties(name, version, {
        contentType: parameters.contentType,
        notBefore: parameters.notBefore,
        expiresOn: parameters.expires,
        tags: parameters.tags,
        abortSignal: options.abortSignal,
      });
      return toSecretProperties(properties, name);
    } catch (error: unknown) {
      throw toProviderError(error);
    }
  }

  /**
   * Soft-delete the secret and wait until the vault reports it deleted,
   * so a read that follows sees it gone.
   */
  async deleteSecret(keyVaultId: string, name: string, options: OperationOptions = {}): Promise<void> {
    const client = this.clients.get(keyVaultId);

    try {
      const poller = await client.beginDeleteSecret(name, { abortSignal: options.abortSignal });
      await poller.pollUntilDone();
    } catch (error: unknown) {
      throw toProviderError(error);
    }
  }
}

function defaultClientFactory(credential: TokenCredential): SecretClientFactory {
  return (vaultUrl) => new SecretClient(vaultUrl, credential);
}

function toSecretProperties(properties: KeyVaultSecretProperties, name: string): SecretProperties {
  if (!properties.id) {
    throw new ProviderError(
      `Secret '${name}' returned incomplete data (id=${properties.id})`,
      ProviderErrorType.UPSTREAM
    );
  }

  return {
    id: properties.id,
    attributes: {
      enabled: properties.enabled,
      notBefore: properties.notBefore,
      expires: properties.expiresOn,
      created: properties.createdOn,
      updated: properties.updatedOn,
    },
    contentType: properties.contentType,
    tags: properties.tags,
  };
}
