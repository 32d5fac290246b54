import { ProviderError, ProviderErrorType } from "@azurekv/adapters-common";
import type { SecretProperties } from "@azurekv/adapters-common";

import { KeyVaultSecretsService } from "../keyvault-secrets-service";

const KEY_VAULT_ID =
  "/subscriptions/sub-123/resourceGroups/test-rg/providers/Microsoft.KeyVault/vaults/myvault";
const SECRET_ID = "https://myvault.vault.azure.net/secrets/db-password/v1";

// ── Mock SDK Client ──────────────────────────────────────────────────────

async function* pagesOf<T>(...pages: T[][]): AsyncGenerator<T[]> {
  for (const page of pages) {
    yield page;
  }
}

function createMockSecretClient() {
  return {
    listPropertiesOfSecretVersions: jest.fn(),
    setSecret: jest.fn(),
    updateSecretProperties: jest.fn(),
    beginDeleteSecret: jest.fn(),
  };
}

function createService(vaultDnsSuffix?: string) {
  const client = createMockSecretClient();
  const createClient = jest.fn((_vaultUrl: string) => client as never);
  const service = new KeyVaultSecretsService({ createClient, vaultDnsSuffix });
  return { service, client, createClient };
}

async function collect(iterable: AsyncIterable<SecretProperties[]>): Promise<SecretProperties[][]> {
  const pages: SecretProperties[][] = [];
  for await (const page of iterable) {
    pages.push(page);
  }
  return pages;
}

// ── Tests ────────────────────────────────────────────────────────────────

describe("KeyVaultSecretsService", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("client cache", () => {
    it("should build one client per vault from the vault name", async () => {
      const { service, client, createClient } = createService();
      client.setSecret.mockResolvedValue({ name: "db-password", properties: { id: SECRET_ID } });

      await service.setSecret(KEY_VAULT_ID, "db-password", { value: "test-secret" });
      await service.setSecret(KEY_VAULT_ID, "db-password", { value: "test-secret" });

      expect(createClient).toHaveBeenCalledTimes(1);
      expect(createClient).toHaveBeenCalledWith("https://myvault.vault.azure.net");
    });

    it("should honour a custom DNS suffix", async () => {
      const { service, client, createClient } = createService("vault.azure.cn");
      client.setSecret.mockResolvedValue({ name: "db-password", properties: { id: SECRET_ID } });

      await service.setSecret(KEY_VAULT_ID, "db-password", { value: "test-secret" });

      expect(createClient).toHaveBeenCalledWith("https://myvault.vault.azure.cn");
    });

    it("should reject a malformed vault ID before building a client", async () => {
      const { service, createClient } = createService();

      await expect(
        service.setSecret("/subscriptions/sub-123/vaults/myvault", "db-password", { value: "test-secret" })
      ).rejects.toMatchObject({ type: ProviderErrorType.INVALID_IDENTIFIER });
      expect(createClient).not.toHaveBeenCalled();
    });
  });

  describe("listSecretVersions", () => {
    it("should map every page to secret properties", async () => {
      const { service, client } = createService();
      const created = new Date("2024-01-01T00:00:00Z");
      const expires = new Date("2025-01-01T00:00:00Z");
      client.listPropertiesOfSecretVersions.mockReturnValue({
        byPage: () =>
          pagesOf(
            [
              {
                id: SECRET_ID,
                name: "db-password",
                vaultUrl: "https://myvault.vault.azure.net",
                enabled: true,
                createdOn: created,
                expiresOn: expires,
                contentType: "text/plain",
                tags: { env: "test" },
              },
            ],
            []
          ),
      });

      const pages = await collect(service.listSecretVersions(KEY_VAULT_ID, "db-password"));

      expect(pages).toEqual([
        [
          {
            id: SECRET_ID,
            attributes: {
              enabled: true,
              notBefore: undefined,
              expires,
              created,
              updated: undefined,
            },
            contentType: "text/plain",
            tags: { env: "test" },
          },
        ],
        [],
      ]);
      expect(client.listPropertiesOfSecretVersions).toHaveBeenCalledWith("db-password", {
        abortSignal: undefined,
      });
    });

    it("should translate a 404 from a page fetch", async () => {
      const { service, client } = createService();
      client.listPropertiesOfSecretVersions.mockReturnValue({
        byPage: async function* () {
          yield [];
          throw { statusCode: 404, message: "Vault not found" };
        },
      });

      await expect(collect(service.listSecretVersions(KEY_VAULT_ID, "db-password"))).rejects.toMatchObject({
        type: ProviderErrorType.NOT_FOUND,
        message: "Vault not found",
      });
    });
  });

  describe("setSecret", () => {
    it("should forward value and metadata", async () => {
      const { service, client } = createService();
      const notBefore = new Date("2024-06-01T00:00:00Z");
      client.setSecret.mockResolvedValue({
        name: "db-password",
        value: "test-secret",
        properties: { id: SECRET_ID, notBefore, contentType: "password" },
      });

      const result = await service.setSecret(KEY_VAULT_ID, "db-password", {
        value: "test-secret",
        contentType: "password",
        notBefore,
        tags: { env: "test" },
      });

      expect(client.setSecret).toHaveBeenCalledWith("db-password", "test-secret", {
        contentType: "password",
        notBefore,
        expiresOn: undefined,
        tags: { env: "test" },
        abortSignal: undefined,
      });
      expect(result.id).toBe(SECRET_ID);
      expect(result.attributes.notBefore).toBe(notBefore);
      expect(result).not.toHaveProperty("value");
    });

    it("should fail when the vault returns no ID", async () => {
      const { service, client } = createService();
      client.setSecret.mockResolvedValue({ name: "db-password", properties: {} });

      await expect(
        service.setSecret(KEY_VAULT_ID, "db-password", { value: "test-secret" })
      ).rejects.toThrow("Secret 'db-password' returned incomplete data (id=undefined)");
    });
  });

  describe("updateSecretProperties", () => {
    it("should address the given version", async () => {
      const { service, client } = createService();
      const expires = new Date("2030-01-01T00:00:00Z");
      client.updateSecretProperties.mockResolvedValue({ id: SECRET_ID, expiresOn: expires });

      const result = await service.updateSecretProperties(KEY_VAULT_ID, "db-password", "v1", {
        expires,
      });

      expect(client.updateSecretProperties).toHaveBeenCalledWith("db-password", "v1", {
        contentType: undefined,
        notBefore: undefined,
        expiresOn: expires,
        tags: undefined,
        abortSignal: undefined,
      });
      expect(result.attributes.expires).toBe(expires);
    });

    it("should translate SDK failures", async () => {
      const { service, client } = createService();
      client.updateSecretProperties.mockRejectedValue({ statusCode: 403, message: "Forbidden" });

      const error = await service
        .updateSecretProperties(KEY_VAULT_ID, "db-password", "v1", {})
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ type: ProviderErrorType.UPSTREAM, message: "Forbidden" });
    });
  });

  describe("deleteSecret", () => {
    it("should wait for the delete to finish", async () => {
      const { service, client } = createService();
      const pollUntilDone = jest.fn().mockResolvedValue({ name: "db-password" });
      client.beginDeleteSecret.mockResolvedValue({ pollUntilDone });

      await service.deleteSecret(KEY_VAULT_ID, "db-password");

      expect(client.beginDeleteSecret).toHaveBeenCalledWith("db-password", { abortSignal: undefined });
      expect(pollUntilDone).toHaveBeenCalledTimes(1);
    });

    it("should map a missing secret to NOT_FOUND", async () => {
      const { service, client } = createService();
      client.beginDeleteSecret.mockRejectedValue({ statusCode: 404, message: "SecretNotFound" });

      await expect(service.deleteSecret(KEY_VAULT_ID, "db-password")).rejects.toMatchObject({
        type: ProviderErrorType.NOT_FOUND,
      });
    });
  });
});
