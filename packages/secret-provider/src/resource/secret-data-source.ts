import {
  LOG_KEY_RESOURCE_ID,
  consoleLogCallback,
  createFieldLogger,
} from "@azurekv/adapters-common";
import type {
  FieldLogger,
  IVaultSecretsApi,
  OperationOptions,
  ProviderLogCallback,
} from "@azurekv/adapters-common";

import { SecretDataSourceConfigSchema, parseConfig } from "../config/schemas";
import type { SecretDataSourceConfig, SecretDataSourceConfigInput } from "../config/schemas";
import type { SecretRecord } from "../model/secret-model";
import { buildSecretRecord } from "../model/secret-record-builder";
import { resolveSecretVersion } from "../resolver/version-resolver";
import { diagnosticFromError } from "./diagnostics";
import type { Diagnostic } from "./diagnostics";

export interface DataSourceResponse {
  diagnostics: Diagnostic[];
  state?: SecretRecord;
}

/**
 * Read-only view of an existing secret, excluding its value.
 */
export class SecretDataSource {
  private readonly logger: FieldLogger;

  constructor(
    private readonly secrets: IVaultSecretsApi,
    log: ProviderLogCallback = consoleLogCallback
  ) {
    this.logger = createFieldLogger(log);
  }

  async read(
    input: SecretDataSourceConfigInput,
    options: OperationOptions = {}
  ): Promise<DataSourceResponse> {
    let config: SecretDataSourceConfig;
    try {
      config = parseConfig(SecretDataSourceConfigSchema, input);
    } catch (error: unknown) {
      return { diagnostics: [diagnosticFromError("Invalid Configuration", error)] };
    }

    try {
      const properties = await resolveSecretVersion(
        this.secrets,
        config.keyVaultId,
        config.name,
        config.version,
        options
      );
      const state = buildSecretRecord(config.keyVaultId, config.name, properties);
      this.logger.with({ [LOG_KEY_RESOURCE_ID]: state.id }).debug("Read secret properties");
      return { diagnostics: [], state };
    } catch (error: unknown) {
      return { diagnostics: [diagnosticFromError("Failed to Get Secret Properties", error)] };
    }
  }
}
