// Interfaces
export type { IVaultSecretsApi } from "./interfaces/vault-secrets-api";
export type { IResourceDirectory } from "./interfaces/resource-directory";

// Types
export type {
  SecretAttributes,
  SecretProperties,
  SecretMetadataParameters,
  SetSecretParameters,
  UpdateSecretPropertiesParameters,
  OperationOptions,
} from "./types/secret";
export type { ProviderLogCallback, LogLevel, LogFields } from "./types/logging";

// Errors
export {
  ProviderError,
  ProviderErrorType,
  isProviderError,
  getStatusCode,
  toProviderError,
  describeError,
} from "./errors/provider-error";

// Identity
export {
  KEY_VAULT_ID_PATTERN,
  SECRET_ID_PATTERN,
  DEFAULT_VAULT_DNS_SUFFIX,
  isKeyVaultId,
  deriveVaultName,
  deriveVaultAndSecretName,
  parseSecretId,
  buildVaultUrl,
} from "./identity/secret-identifiers";
export type { ParsedSecretId } from "./identity/secret-identifiers";

// Utilities
export {
  LOG_KEY_RESOURCE_ID,
  formatLogLine,
  consoleLogCallback,
  createFieldLogger,
} from "./utils/log-line";
export type { FieldLogger } from "./utils/log-line";
