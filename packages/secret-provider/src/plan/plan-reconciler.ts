/**
 * Plan Reconciler
 *
 * Predicts, before apply and without touching the network, which computed
 * attributes of a secret change. Only a rotation mints a new version, and only
 * a new version changes the versioned identifiers.
 */

import type { SecretResourceState } from "../model/secret-model";
import { UNKNOWN, isUnknown } from "./plan-values";
import type { Planned, UnknownValue } from "./plan-values";

/**
 * The write-only inputs of a proposed configuration.
 * null/undefined means the attribute is absent (for example ignored by lifecycle rules).
 */
export interface SecretPlanConfig {
  valueWo?: string | null | UnknownValue;
  valueWoVersion?: number | null | UnknownValue;
}

export type RotationDecision =
  /** Value or counter absent from configuration; treated as no change */
  | "value-ignored"
  /** Value not resolvable until apply; rotation is certain */
  | "value-deferred"
  /** Counter differs from state; rotation is certain */
  | "counter-changed"
  /** Counter unchanged; only metadata may change */
  | "unchanged";

export interface PlannedComputedAttributes {
  id: Planned<string>;
  resourceId: Planned<string>;
  version: Planned<string>;
  versionlessId: string;
  resourceVersionlessId: string;
}

export type PlanDecision =
  | { action: "create" }
  | { action: "destroy" }
  | {
      action: "update";
      decision: RotationDecision;
      rotates: boolean;
      planned: PlannedComputedAttributes;
      reason: string;
    };

export function reconcilePlan(
  priorState: SecretResourceState | null | undefined,
  config: SecretPlanConfig | null | undefined
): PlanDecision {
  if (!config) {
    return { action: "destroy" };
  }
  if (!priorState) {
    return { action: "create" };
  }

  const { valueWo, valueWoVersion } = config;

  if (valueWo == null || valueWoVersion == null) {
    return update(
      priorState,
      "value-ignored",
      "The secret value will not be updated because the change of value_wo or value_wo_version seems to be ignored by the lifecycle"
    );
  }

  if (isUnknown(valueWo)) {
    return update(
      priorState,
      "value-deferred",
      "The secret value will be updated because the value is unknown"
    );
  }

  if (isUnknown(valueWoVersion) || valueWoVersion !== priorState.valueWoVersion) {
    return update(
      priorState,
      "counter-changed",
      "The secret value will be updated because value_wo_version changes"
    );
  }

  return update(
    priorState,
    "unchanged",
    "The secret value will not be updated because value_wo_version is unchanged"
  );
}

function update(
  priorState: SecretResourceState,
  decision: RotationDecision,
  reason: string
): PlanDecision {
  const rotates = decision === "value-deferred" || decision === "counter-changed";

  return {
    action: "update",
    decision,
    rotates,
    reason,
    planned: {
      id: rotates ? UNKNOWN : priorState.id,
      resourceId: rotates ? UNKNOWN : priorState.resourceId,
      version: rotates ? UNKNOWN : priorState.version,
      versionlessId: priorState.versionlessId,
      resourceVersionlessId: priorState.resourceVersionlessId,
    },
  };
}
