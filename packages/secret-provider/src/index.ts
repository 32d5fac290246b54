// Provider
export { createSecretProvider, SUBSCRIPTION_ID_ENV } from "./provider";
export type { SecretProvider, SecretProviderOptions } from "./provider";

// Configuration
export {
  ProviderConfigSchema,
  SecretResourceConfigSchema,
  SecretDataSourceConfigSchema,
  SdkLogLevelSchema,
  parseConfig,
} from "./config/schemas";
export type {
  ProviderConfig,
  ProviderConfigInput,
  SecretResourceConfig,
  SecretResourceConfigInput,
  SecretDataSourceConfig,
  SecretDataSourceConfigInput,
} from "./config/schemas";

// Model
export { SecretModel } from "./model/secret-model";
export type {
  SecretRecord,
  SecretResourceState,
  SecretResourceIdentity,
  SecretRecordSink,
  SecretModelSeed,
} from "./model/secret-model";
export {
  applySecretProperties,
  buildSecretRecord,
  formatTimestamp,
  toTagMap,
} from "./model/secret-record-builder";

// Resolution & planning
export { resolveSecretVersion, SECRET_READ_PERMISSION } from "./resolver/version-resolver";
export { reconcilePlan } from "./plan/plan-reconciler";
export type {
  PlanDecision,
  PlannedComputedAttributes,
  RotationDecision,
  SecretPlanConfig,
} from "./plan/plan-reconciler";
export { UNKNOWN, UnknownValue, isUnknown } from "./plan/plan-values";
export type { Planned } from "./plan/plan-values";

// Engine
export {
  SecretReconciler,
  rotationRequired,
  IMPORTED_VALUE_WO_VERSION,
} from "./reconciler/secret-reconciler";
export type {
  SecretReconcilerOptions,
  ReconciledSecret,
  SecretImportRequest,
} from "./reconciler/secret-reconciler";

// Operation boundaries
export { SecretResource } from "./resource/secret-resource";
export type {
  ResourceResponse,
  ModifyPlanRequest,
  ModifyPlanResponse,
  CreateRequest,
  UpdateRequest,
} from "./resource/secret-resource";
export { SecretDataSource } from "./resource/secret-data-source";
export type { DataSourceResponse } from "./resource/secret-data-source";
export { errorDiagnostic, diagnosticFromError, hasError } from "./resource/diagnostics";
export type { Diagnostic, DiagnosticSeverity } from "./resource/diagnostics";
