import {
  ProviderError,
  ProviderErrorType,
  parseSecretId,
} from "@azurekv/adapters-common";
import type { SecretProperties } from "@azurekv/adapters-common";

import { SecretModel } from "./secret-model";
import type { SecretModelSeed, SecretRecord, SecretRecordSink } from "./secret-model";

/**
 * Write vault-reported properties into a record.
 *
 * Identifiers are always recomputed from the versioned ID. Content type,
 * validity dates and tags are only written when the vault reports them, so a
 * sink seeded from configuration or prior state keeps its values otherwise.
 *
 * @throws ProviderError INVALID_IDENTIFIER when the ID carries no version
 * @throws ProviderError SERIALIZATION when a tag value or timestamp cannot be represented
 */
export function applySecretProperties(sink: SecretRecordSink, properties: SecretProperties): void {
  const parsed = parseSecretId(properties.id);
  const version = parsed.version;
  if (!version) {
    throw new ProviderError(
      `secret ID "${properties.id}" does not name a version`,
      ProviderErrorType.INVALID_IDENTIFIER
    );
  }

  sink.setId(properties.id);
  sink.setVersionlessId(trimSuffix(properties.id, `/${version}`, parsed.versionlessId));
  sink.setVersion(version);

  const resourceVersionlessId = `${sink.getKeyVaultId()}/secrets/${parsed.name}`;
  sink.setResourceVersionlessId(resourceVersionlessId);
  sink.setResourceId(`${resourceVersionlessId}/versions/${version}`);

  if (properties.contentType !== undefined) {
    sink.setContentType(properties.contentType);
  }

  const { notBefore, expires } = properties.attributes;
  if (notBefore) {
    sink.setNotBeforeDate(formatTimestamp(notBefore));
  }
  if (expires) {
    sink.setExpirationDate(formatTimestamp(expires));
  }

  if (properties.tags) {
    sink.setTags(toTagMap(properties.tags));
  }
}

/**
 * Build a fresh record for a secret in a vault.
 */
export function buildSecretRecord(
  keyVaultId: string,
  name: string,
  properties: SecretProperties,
  seed: SecretModelSeed = {}
): SecretRecord {
  const model = new SecretModel(name, keyVaultId, seed);
  applySecretProperties(model, properties);
  return model.toRecord();
}

/**
 * Canonical RFC 3339 UTC form; fractional seconds only when non-zero.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new ProviderError("invalid timestamp in secret attributes", ProviderErrorType.SERIALIZATION);
  }
  return date.toISOString().replace(".000Z", "Z");
}

/**
 * Convert a raw tag mapping to string → string.
 */
export function toTagMap(tags: Record<string, string | null | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    if (typeof value !== "string") {
      throw new ProviderError(
        `tag "${key}" has no string value (got ${value === null ? "null" : typeof value})`,
        ProviderErrorType.SERIALIZATION
      );
    }
    result[key] = value;
  }
  return result;
}

function trimSuffix(value: string, suffix: string, fallback: string): string {
  return value.endsWith(suffix) ? value.slice(0, value.length - suffix.length) : fallback;
}
