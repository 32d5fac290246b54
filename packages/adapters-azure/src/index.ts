// Secrets & Key Vault
export { KeyVaultSecretsService, KeyVaultSecretsServiceOptions } from "./secrets/keyvault-secrets-service";
export { SecretClientCache, SecretClientFactory } from "./secrets/secret-client-cache";

// Resource Management
export {
  ResourceDirectoryService,
  ResourceClientFactory,
  KEY_VAULT_RESOURCE_TYPE,
} from "./resources/resource-directory-service";

// Logging
export { forwardSdkLogs } from "./logging/sdk-log-forwarder";
