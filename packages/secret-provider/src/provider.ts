/**
 * Secret Provider Factory
 *
 * Validates provider configuration and wires the Azure collaborators, the
 * reconciliation engine, the resource and the data source together.
 */

import type { TokenCredential } from "@azure/identity";
import {
  KeyVaultSecretsService,
  ResourceDirectoryService,
  forwardSdkLogs,
} from "@azurekv/adapters-azure";
import { consoleLogCallback } from "@azurekv/adapters-common";
import type {
  IResourceDirectory,
  IVaultSecretsApi,
  ProviderLogCallback,
} from "@azurekv/adapters-common";

import { ProviderConfigSchema, parseConfig } from "./config/schemas";
import type { ProviderConfig, ProviderConfigInput } from "./config/schemas";
import { SecretReconciler } from "./reconciler/secret-reconciler";
import { SecretDataSource } from "./resource/secret-data-source";
import { SecretResource } from "./resource/secret-resource";

export const SUBSCRIPTION_ID_ENV = "ARM_SUBSCRIPTION_ID";

export interface SecretProviderOptions {
  /** Azure credentials (optional, uses DefaultAzureCredential if not provided) */
  credential?: TokenCredential;
  /** Log callback function */
  log?: ProviderLogCallback;
  /** Environment consulted for fallbacks. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Replace the Azure collaborators (testing, alternative back ends) */
  secrets?: IVaultSecretsApi;
  resources?: IResourceDirectory;
}

export interface SecretProvider {
  config: ProviderConfig;
  resource: SecretResource;
  dataSource: SecretDataSource;
}

/**
 * Create a configured provider.
 *
 * @example
 * ```typescript
 * const { resource } = createSecretProvider({ subscriptionId: "00000000-0000-0000-0000-000000000000" });
 * const created = await resource.create({
 *   config: { name: "db-password", keyVaultId, valueWoVersion: 1 },
 *   value: "test-secret",
 * });
 * ```
 *
 * @throws ProviderError INVALID_CONFIGURATION
 */
export function createSecretProvider(
  input: ProviderConfigInput = {},
  options: SecretProviderOptions = {}
): SecretProvider {
  const env = options.env ?? process.env;
  const log = options.log ?? consoleLogCallback;

  const config = parseConfig(ProviderConfigSchema, {
    ...input,
    subscriptionId: input.subscriptionId ?? (env[SUBSCRIPTION_ID_ENV] || undefined),
  });

  if (config.sdkLogLevel) {
    forwardSdkLogs(log, config.sdkLogLevel);
  }

  const secrets =
    options.secrets ??
    new KeyVaultSecretsService({
      credential: options.credential,
      vaultDnsSuffix: config.vaultDnsSuffix,
    });
  const resources = options.resources ?? new ResourceDirectoryService(options.credential);

  const reconciler = new SecretReconciler({
    secrets,
    resources,
    subscriptionId: config.subscriptionId,
    log,
  });

  return {
    config,
    resource: new SecretResource(reconciler, log),
    dataSource: new SecretDataSource(secrets, log),
  };
}
