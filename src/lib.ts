export type * from './domain/entities/service-config.entity.js';
export type * from './domain/entities/validation.entity.js';
export type * from './domain/entities/plan.entity.js';
export type * from './domain/entities/run.entity.js';
export type * from './domain/ports/platform.port.js';
export type { ISecretStore, SecretStoreProvider } from './domain/ports/secretstore.port.js';

export { ApplyError, DeckhandError, ParseError, PlanningError, ValidationError } from './domain/errors.js';
export type { ParseIssue, DeckhandErrorCode } from './domain/errors.js';

export { parseManifest, loadManifestFile, serializeManifest, renderManifest } from './domain/services/manifest.parser.js';
export { validateConfig, assertValid, hasErrors } from './domain/services/manifest.validator.js';
export { planReconciliation, describeAction, buildFingerprint } from './domain/services/reconcile.planner.js';
export { ReconcileOrchestrator, deriveActionTimeoutMs } from './domain/services/reconcile.orchestrator.js';
export type { ApplyResult, PlanResult, ReconcileOptions, OrchestratorOptions } from './domain/services/reconcile.orchestrator.js';
export { SecretResolver } from './domain/services/secret.resolver.js';
export { ServiceLocks } from './domain/services/service-locks.js';
export { AdapterFactory } from './domain/services/adapter.factory.js';

export { LocalPlatformAdapter } from './adapters/providers/local/local.adapter.js';
export { HttpPlatformAdapter, PlatformApiError } from './adapters/providers/http/http.adapter.js';
export { EnvSecretStore } from './adapters/secrets/env-secret-store.js';
export { FileSecretStore } from './adapters/secrets/file-secret-store.js';
export { initializeDatabase, initializeMemoryDatabase } from './adapters/db/sqlite.adapter.js';

export { loadConfig, DEFAULT_ALLOWED_REGIONS } from './config.js';
export type { DeckhandConfig } from './config.js';
export { createServer } from './server.js';
