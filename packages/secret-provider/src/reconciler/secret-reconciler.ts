/**
 * Reconciliation Engine
 *
 * Applies create / read / update / delete / import for one secret against the
 * vault collaborators. Owns the one decision that matters: a changed rotation
 * counter mints a new version, an unchanged one only rewrites metadata of the
 * current version.
 *
 * Every method either returns complete state or throws a ProviderError;
 * callers keep their prior state on failure.
 */

import {
  LOG_KEY_RESOURCE_ID,
  ProviderError,
  ProviderErrorType,
  consoleLogCallback,
  createFieldLogger,
  deriveVaultAndSecretName,
  deriveVaultName,
} from "@azurekv/adapters-common";
import type {
  FieldLogger,
  IResourceDirectory,
  IVaultSecretsApi,
  OperationOptions,
  ProviderLogCallback,
  SecretMetadataParameters,
} from "@azurekv/adapters-common";

import type { SecretResourceConfig } from "../config/schemas";
import { SecretModel } from "../model/secret-model";
import type { SecretResourceIdentity, SecretResourceState } from "../model/secret-model";
import { applySecretProperties } from "../model/secret-record-builder";
import { resolveSecretVersion } from "../resolver/version-resolver";

/** Rotation counter written into freshly imported state */
export const IMPORTED_VALUE_WO_VERSION = 1;

export interface SecretReconcilerOptions {
  secrets: IVaultSecretsApi;
  resources: IResourceDirectory;
  /** Required only for importing by secret ID */
  subscriptionId?: string;
  log?: ProviderLogCallback;
}

export interface ReconciledSecret {
  state: SecretResourceState;
  identity: SecretResourceIdentity;
}

/**
 * Import either by structured identity or by a (legacy) secret URI.
 */
export type SecretImportRequest = { identity: SecretResourceIdentity } | { id: string };

/**
 * True when applying `plan` over `prior` mints a new version.
 */
export function rotationRequired(
  plan: Pick<SecretResourceConfig, "valueWoVersion">,
  prior: Pick<SecretResourceState, "valueWoVersion">
): boolean {
  return plan.valueWoVersion !== prior.valueWoVersion;
}

export class SecretReconciler {
  private readonly secrets: IVaultSecretsApi;
  private readonly resources: IResourceDirectory;
  private readonly subscriptionId?: string;
  private readonly logger: FieldLogger;

  constructor(options: SecretReconcilerOptions) {
    this.secrets = options.secrets;
    this.resources = options.resources;
    this.subscriptionId = options.subscriptionId;
    this.logger = createFieldLogger(options.log ?? consoleLogCallback);
  }

  /**
   * Mint the first version. Always calls setSecret.
   */
  async create(
    plan: SecretResourceConfig,
    value: string,
    options: OperationOptions = {}
  ): Promise<ReconciledSecret> {
    const model = modelFromPlan(plan);
    const log = this.logger.with({ name: plan.name, key_vault_id: plan.keyVaultId });

    log.debug("Setting secret");
    const properties = await this.secrets.setSecret(
      plan.keyVaultId,
      plan.name,
      { value, ...toMetadata(plan) },
      options
    );
    applySecretProperties(model, properties);
    log.with({ [LOG_KEY_RESOURCE_ID]: model.id }).info("Created secret");

    return { state: model.toResourceState(plan.valueWoVersion), identity: model.toIdentity() };
  }

  /**
   * Refresh state from the latest version. Never writes to the vault.
   */
  async read(state: SecretResourceState, options: OperationOptions = {}): Promise<ReconciledSecret> {
    const log = this.logger.with({ [LOG_KEY_RESOURCE_ID]: state.id });

    log.debug("Reading secret properties");
    const properties = await resolveSecretVersion(
      this.secrets,
      state.keyVaultId,
      state.name,
      undefined,
      options
    );
    const model = SecretModel.fromRecord(state);
    applySecretProperties(model, properties);

    if (model.version !== state.version) {
      log.debug(`Secret has a newer version ${model.version}`);
    }

    return { state: model.toResourceState(state.valueWoVersion), identity: model.toIdentity() };
  }

  /**
   * Rotate or rewrite metadata depending on the rotation counter.
   * @param value - Write-only value; required when the counter changed
   */
  async update(
    plan: SecretResourceConfig,
    prior: SecretResourceState,
    value: string | undefined,
    options: OperationOptions = {}
  ): Promise<ReconciledSecret> {
    const model = modelFromPlan(plan, prior);
    const log = this.logger.with({ [LOG_KEY_RESOURCE_ID]: prior.id });
    const metadata = toMetadata(plan);

    if (rotationRequired(plan, prior)) {
      if (value === undefined) {
        throw new ProviderError(
          `value_wo must be set to rotate the secret "${plan.name}"`,
          ProviderErrorType.MISSING_CONFIGURATION
        );
      }

      log.debug(
        `Minting a new version because value_wo_version changes from ${prior.valueWoVersion} to ${plan.valueWoVersion}`
      );
      const properties = await this.secrets.setSecret(
        plan.keyVaultId,
        plan.name,
        { value, ...metadata },
        options
      );
      applySecretProperties(model, properties);
      log.info(`Rotated secret to version ${model.version}`);
    } else {
      log.debug(`Updating properties of version ${prior.version}`);
      const properties = await this.secrets.updateSecretProperties(
        plan.keyVaultId,
        plan.name,
        prior.version,
        metadata,
        options
      );
      applySecretProperties(model, properties);
    }

    return { state: model.toResourceState(plan.valueWoVersion), identity: model.toIdentity() };
  }

  /**
   * Delete the secret and every version of it.
   */
  async delete(state: SecretResourceState, options: OperationOptions = {}): Promise<void> {
    const log = this.logger.with({ [LOG_KEY_RESOURCE_ID]: state.id });

    log.debug("Deleting secret");
    await this.secrets.deleteSecret(state.keyVaultId, state.name, options);
    log.info("Deleted secret");
  }

  /**
   * Rebuild state for an existing secret. The rotation counter starts at 1.
   */
  async importState(
    request: SecretImportRequest,
    options: OperationOptions = {}
  ): Promise<ReconciledSecret> {
    const identity = await this.resolveImportIdentity(request, options);
    return this.importIdentity(identity, options);
  }

  /**
   * Work out which secret an import request names.
   * A structured identity is used as is; a secret URI needs the subscription
   * to find the vault's resource ID.
   */
  async resolveImportIdentity(
    request: SecretImportRequest,
    options: OperationOptions = {}
  ): Promise<SecretResourceIdentity> {
    if ("identity" in request) {
      return validateIdentity(request.identity);
    }

    if (!this.subscriptionId) {
      throw new ProviderError(
        "Subscription ID is required to import a secret",
        ProviderErrorType.MISSING_CONFIGURATION,
        undefined,
        ["set subscription_id in the provider configuration or the ARM_SUBSCRIPTION_ID environment variable"]
      );
    }

    const { vaultName, name } = deriveVaultAndSecretName(request.id);
    this.logger.with({ [LOG_KEY_RESOURCE_ID]: request.id }).debug(`Looking up key vault ${vaultName}`);
    const keyVaultId = await this.resources.findKeyVaultId(this.subscriptionId, vaultName, options);

    return { name, keyVaultId };
  }

  /**
   * Resolve the latest version of an identified secret into fresh state.
   */
  async importIdentity(
    identity: SecretResourceIdentity,
    options: OperationOptions = {}
  ): Promise<ReconciledSecret> {
    const properties = await resolveSecretVersion(
      this.secrets,
      identity.keyVaultId,
      identity.name,
      undefined,
      options
    );
    const model = new SecretModel(identity.name, identity.keyVaultId);
    applySecretProperties(model, properties);
    this.logger.with({ [LOG_KEY_RESOURCE_ID]: model.id }).info("Imported secret");

    return { state: model.toResourceState(IMPORTED_VALUE_WO_VERSION), identity: model.toIdentity() };
  }
}

function validateIdentity(identity: SecretResourceIdentity): SecretResourceIdentity {
  if (!identity.name) {
    throw new ProviderError("import identity has an empty name", ProviderErrorType.INVALID_IDENTIFIER);
  }
  deriveVaultName(identity.keyVaultId);
  return identity;
}

function modelFromPlan(plan: SecretResourceConfig, prior?: SecretResourceState): SecretModel {
  return new SecretModel(plan.name, plan.keyVaultId, {
    ...prior,
    contentType: plan.contentType,
    notBeforeDate: plan.notBeforeDate,
    expirationDate: plan.expirationDate,
    tags: plan.tags,
  });
}

function toMetadata(plan: SecretResourceConfig): SecretMetadataParameters {
  return {
    contentType: plan.contentType,
    notBefore: plan.notBeforeDate ? new Date(plan.notBeforeDate) : undefined,
    expires: plan.expirationDate ? new Date(plan.expirationDate) : undefined,
    tags: plan.tags,
  };
}
