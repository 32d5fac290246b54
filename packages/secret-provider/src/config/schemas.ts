/**
 * Provider and resource configuration schemas.
 */
import { z } from "zod";
import {
  DEFAULT_VAULT_DNS_SUFFIX,
  KEY_VAULT_ID_PATTERN,
  ProviderError,
  ProviderErrorType,
} from "@azurekv/adapters-common";

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

const Rfc3339Schema = z.string().datetime({ offset: true });

const KeyVaultIdSchema = z
  .string()
  .regex(KEY_VAULT_ID_PATTERN, "must be a key vault resource ID (/subscriptions/{s}/resourceGroups/{g}/providers/Microsoft.KeyVault/vaults/{name})");

export const SdkLogLevelSchema = z.enum(["verbose", "info", "warning", "error"]);

export const ProviderConfigSchema = z.object({
  /** Only required for importing by secret ID. Falls back to ARM_SUBSCRIPTION_ID. */
  subscriptionId: z.string().min(1).optional(),
  /** DNS suffix of vault URLs, e.g. vault.azure.cn for Azure China */
  vaultDnsSuffix: z.string().min(1).default(DEFAULT_VAULT_DNS_SUFFIX),
  /** Forward Azure SDK logs at this level when set */
  sdkLogLevel: SdkLogLevelSchema.optional(),
});
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

export const SecretResourceConfigSchema = z.object({
  name: z.string().min(1),
  keyVaultId: KeyVaultIdSchema,
  contentType: z.string().default(""),
  notBeforeDate: Rfc3339Schema.optional(),
  expirationDate: Rfc3339Schema.optional(),
  tags: z.record(z.string()).default({}),
  /** Increment to rotate the write-only value */
  valueWoVersion: z.number().int(),
});
export type SecretResourceConfig = z.infer<typeof SecretResourceConfigSchema>;
export type SecretResourceConfigInput = z.input<typeof SecretResourceConfigSchema>;

export const SecretDataSourceConfigSchema = z.object({
  name: z.string().min(1),
  keyVaultId: KeyVaultIdSchema,
  /** Defaults to the latest version */
  version: z.string().optional(),
});
export type SecretDataSourceConfig = z.infer<typeof SecretDataSourceConfigSchema>;
export type SecretDataSourceConfigInput = z.input<typeof SecretDataSourceConfigSchema>;

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

/**
 * Parse input against a schema.
 * @throws ProviderError INVALID_CONFIGURATION listing every issue
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    );
    throw new ProviderError(
      `invalid configuration: ${issues.join("; ")}`,
      ProviderErrorType.INVALID_CONFIGURATION,
      result.error
    );
  }
  return result.data;
}
