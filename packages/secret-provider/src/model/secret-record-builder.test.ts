import { ProviderErrorType } from "@azurekv/adapters-common";
import type { SecretProperties } from "@azurekv/adapters-common";

import { keyVaultIdFor } from "../__tests__/fakes";
import { SecretModel } from "./secret-model";
import { applySecretProperties, buildSecretRecord, formatTimestamp, toTagMap } from "./secret-record-builder";

const KEY_VAULT_ID = keyVaultIdFor("myvault");
const SECRET_ID = "https://myvault.vault.azure.net/secrets/db-password/0123abcd";

function properties(overrides: Partial<SecretProperties> = {}): SecretProperties {
  return { id: SECRET_ID, attributes: {}, ...overrides };
}

describe("buildSecretRecord", () => {
  it("should derive identifiers from the versioned ID", () => {
    const record = buildSecretRecord(KEY_VAULT_ID, "db-password", properties());

    expect(record).toEqual({
      name: "db-password",
      keyVaultId: KEY_VAULT_ID,
      id: SECRET_ID,
      versionlessId: "https://myvault.vault.azure.net/secrets/db-password",
      version: "0123abcd",
      resourceVersionlessId: `${KEY_VAULT_ID}/secrets/db-password`,
      resourceId: `${KEY_VAULT_ID}/secrets/db-password/versions/0123abcd`,
      tags: {},
    });
  });

  it("should format timestamps as RFC 3339 UTC", () => {
    const record = buildSecretRecord(
      KEY_VAULT_ID,
      "db-password",
      properties({
        attributes: {
          notBefore: new Date("2024-05-01T10:00:00+02:00"),
          expires: new Date("2025-05-01T08:00:00.250Z"),
        },
      })
    );

    expect(record.notBeforeDate).toBe("2024-05-01T08:00:00Z");
    expect(record.expirationDate).toBe("2025-05-01T08:00:00.250Z");
  });

  it("should copy content type and tags", () => {
    const record = buildSecretRecord(
      KEY_VAULT_ID,
      "db-password",
      properties({ contentType: "text/plain", tags: { env: "test", team: "platform" } })
    );

    expect(record.contentType).toBe("text/plain");
    expect(record.tags).toEqual({ env: "test", team: "platform" });
  });

  it("should keep seeded values the vault does not report", () => {
    const record = buildSecretRecord(KEY_VAULT_ID, "db-password", properties(), {
      contentType: "password",
      expirationDate: "2030-01-01T00:00:00Z",
      tags: { env: "test" },
    });

    expect(record.contentType).toBe("password");
    expect(record.expirationDate).toBe("2030-01-01T00:00:00Z");
    expect(record.tags).toEqual({ env: "test" });
  });

  it("should reject a versionless ID", () => {
    expect(() =>
      buildSecretRecord(
        KEY_VAULT_ID,
        "db-password",
        properties({ id: "https://myvault.vault.azure.net/secrets/db-password" })
      )
    ).toThrow(expect.objectContaining({ type: ProviderErrorType.INVALID_IDENTIFIER }));
  });

  it("should reject a tag without a string value", () => {
    expect(() =>
      buildSecretRecord(KEY_VAULT_ID, "db-password", properties({ tags: { env: null } }))
    ).toThrow('tag "env" has no string value (got null)');
  });
});

describe("applySecretProperties", () => {
  it("should overwrite prior identifiers on a model", () => {
    const model = new SecretModel("db-password", KEY_VAULT_ID, {
      id: "https://myvault.vault.azure.net/secrets/db-password/old",
      version: "old",
    });

    applySecretProperties(model, properties());

    expect(model.version).toBe("0123abcd");
    expect(model.id).toBe(SECRET_ID);
  });
});

describe("formatTimestamp", () => {
  it("should reject an invalid date", () => {
    expect(() => formatTimestamp(new Date("not a date"))).toThrow(
      expect.objectContaining({ type: ProviderErrorType.SERIALIZATION })
    );
  });
});

describe("toTagMap", () => {
  it("should report undefined values", () => {
    expect(() => toTagMap({ owner: undefined })).toThrow('tag "owner" has no string value (got undefined)');
  });
});
