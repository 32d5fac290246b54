/**
 * Secret resource operation boundary.
 *
 * Validates orchestrator input, delegates to the SecretReconciler and turns
 * every failure into diagnostics. A failed create, read, update or import
 * returns no state, so the orchestrator keeps what it had; a failed delete
 * hands the prior state back for a retry.
 */

import {
  LOG_KEY_RESOURCE_ID,
  ProviderErrorType,
  consoleLogCallback,
  createFieldLogger,
  toProviderError,
} from "@azurekv/adapters-common";
import type { FieldLogger, OperationOptions, ProviderLogCallback } from "@azurekv/adapters-common";

import { SecretResourceConfigSchema, parseConfig } from "../config/schemas";
import type { SecretResourceConfig, SecretResourceConfigInput } from "../config/schemas";
import type { SecretResourceIdentity, SecretResourceState } from "../model/secret-model";
import { reconcilePlan } from "../plan/plan-reconciler";
import type { PlanDecision, SecretPlanConfig } from "../plan/plan-reconciler";
import { SecretReconciler, rotationRequired } from "../reconciler/secret-reconciler";
import type { SecretImportRequest } from "../reconciler/secret-reconciler";
import { diagnosticFromError } from "./diagnostics";
import type { Diagnostic } from "./diagnostics";

export interface ResourceResponse {
  diagnostics: Diagnostic[];
  state?: SecretResourceState;
  identity?: SecretResourceIdentity;
}

export interface ModifyPlanRequest {
  priorState?: SecretResourceState | null;
  config?: SecretPlanConfig | null;
}

export interface ModifyPlanResponse {
  diagnostics: Diagnostic[];
  plan: PlanDecision;
}

export interface CreateRequest {
  config: SecretResourceConfigInput;
  /** Write-only value; never stored */
  value: string;
}

export interface UpdateRequest {
  config: SecretResourceConfigInput;
  priorState: SecretResourceState;
  /** Write-only value; only needed when value_wo_version changes */
  value?: string;
}

export class SecretResource {
  private readonly logger: FieldLogger;

  constructor(
    private readonly reconciler: SecretReconciler,
    log: ProviderLogCallback = consoleLogCallback
  ) {
    this.logger = createFieldLogger(log);
  }

  modifyPlan(request: ModifyPlanRequest): ModifyPlanResponse {
    const plan = reconcilePlan(request.priorState, request.config);
    if (plan.action === "update") {
      this.logger.with({ [LOG_KEY_RESOURCE_ID]: request.priorState?.id }).debug(plan.reason);
    }
    return { diagnostics: [], plan };
  }

  async create(request: CreateRequest, options: OperationOptions = {}): Promise<ResourceResponse> {
    const parsed = this.parse(request.config);
    if (!parsed.ok) {
      return parsed.response;
    }

    try {
      const { state, identity } = await this.reconciler.create(parsed.config, request.value, options);
      return { diagnostics: [], state, identity };
    } catch (error: unknown) {
      return failure(
        diagnosticFromError(
          "Failed to Set Secret",
          error,
          "An unexpected error occurred while setting a secret: "
        )
      );
    }
  }

  async read(state: SecretResourceState, options: OperationOptions = {}): Promise<ResourceResponse> {
    try {
      const result = await this.reconciler.read(state, options);
      return { diagnostics: [], state: result.state, identity: result.identity };
    } catch (error: unknown) {
      return failure(diagnosticFromError("Failed to Get Secret Properties", error));
    }
  }

  async update(request: UpdateRequest, options: OperationOptions = {}): Promise<ResourceResponse> {
    const parsed = this.parse(request.config);
    if (!parsed.ok) {
      return parsed.response;
    }

    try {
      const { state, identity } = await this.reconciler.update(
        parsed.config,
        request.priorState,
        request.value,
        options
      );
      return { diagnostics: [], state, identity };
    } catch (error: unknown) {
      const diagnostic = rotationRequired(parsed.config, request.priorState)
        ? diagnosticFromError(
            "Failed to Set Secret",
            error,
            "An unexpected error occurred while setting a secret: "
          )
        : diagnosticFromError(
            "Failed to Update Secret Properties",
            error,
            "An unexpected error occurred while updating secret properties: "
          );
      return failure(diagnostic);
    }
  }

  async delete(state: SecretResourceState, options: OperationOptions = {}): Promise<ResourceResponse> {
    try {
      await this.reconciler.delete(state, options);
      return { diagnostics: [] };
    } catch (error: unknown) {
      // State is handed back untouched so the delete can be retried.
      return {
        diagnostics: [
          diagnosticFromError(
            "Failed to Delete Secret",
            error,
            "An unexpected error occurred while deleting a secret: "
          ),
        ],
        state,
      };
    }
  }

  async importState(
    request: SecretImportRequest,
    options: OperationOptions = {}
  ): Promise<ResourceResponse> {
    let identity: SecretResourceIdentity;
    try {
      identity = await this.reconciler.resolveImportIdentity(request, options);
    } catch (error: unknown) {
      return failure(diagnosticFromError(identitySummary(error), error));
    }

    try {
      const result = await this.reconciler.importIdentity(identity, options);
      return { diagnostics: [], state: result.state, identity: result.identity };
    } catch (error: unknown) {
      return failure(diagnosticFromError("Failed to Get Secret Properties", error));
    }
  }

  private parse(input: SecretResourceConfigInput): ParseResult {
    try {
      return { ok: true, config: parseConfig(SecretResourceConfigSchema, input) };
    } catch (error: unknown) {
      return { ok: false, response: failure(diagnosticFromError("Invalid Configuration", error)) };
    }
  }
}

type ParseResult =
  | { ok: true; config: SecretResourceConfig }
  | { ok: false; response: ResourceResponse };

function failure(diagnostic: Diagnostic): ResourceResponse {
  return { diagnostics: [diagnostic] };
}

function identitySummary(error: unknown): string {
  switch (toProviderError(error).type) {
    case ProviderErrorType.MISSING_CONFIGURATION:
      return "Missing Configuration";
    case ProviderErrorType.INVALID_IDENTIFIER:
      return "Invalid ID";
    default:
      return "Failed to Get KeyVaults";
  }
}
