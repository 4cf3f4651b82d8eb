/**
 * Library entry point.
 *
 * @example
 * ```typescript
 * import { exportObjects, loadServersConfig, validateRuntimeConfig } from 'dashsync';
 *
 * const runtime = validateRuntimeConfig()._unsafeUnwrap();
 * const servers = loadServersConfig(runtime.configFile)._unsafeUnwrap();
 * await exportObjects({ runtime, servers }, {
 *   target: 'staging',
 *   types: ['dashboard'],
 *   sink: { kind: 'files', directory: './export' },
 * });
 * ```
 */

export { createServerTarget, listTargets, resolveTarget } from './targets';
export { loadServersConfig, validateRuntimeConfig, validateServersConfig } from './validation';
export { detectBackend, resetCapabilityCache } from './objects/capability';
export type { BackendDetection } from './objects/capability';
export type { BackendMode, PageCursor, SavedObjectBackend } from './objects/backend';
export { ModernApiBackend } from './objects/modern-backend';
export { LegacyIndexBackend } from './objects/legacy-backend';
export { ObjectRepositoryClient } from './objects/repository';
export type {
  ExportRequest,
  ExportResult,
  ImportBatchOptions,
  RepositoryOptions,
} from './objects/repository';
export { decodeContent, decodeNdjson, encodeJsonArray, encodeNdjson } from './objects/codec';
export { connectTarget, openSession } from './objects/session';
export type { Session, SessionDeps } from './objects/session';
export { checkReferences, exportObjects, importObjects, readImportSource } from './objects/pipeline';
export type {
  ExportOptions,
  ExportReport,
  ExportSink,
  ImportOptions,
  ImportReport,
  ImportSource,
} from './objects/pipeline';
export { applyPolicyEdit, checkPhaseOrdering, fromRawPolicy, toRawPolicy } from './ilm/composer';
export { editPolicy, getPolicy } from './ilm/policies';
export { getLifecycleInfo } from './ilm/info';
export { RestCluster, createCluster, detectDistribution } from './transport/cluster';
export type { ClusterApi, ClusterDistribution, ClusterTransport } from './transport/cluster';
export { ElasticsearchTransport, createClusterClient } from './transport/elasticsearch';
export { FetchClusterTransport } from './transport/fetch-cluster';
export { DashboardsHttp, createTlsFetch } from './transport/http';
export * from './types/errors';
export type * from './types/saved-objects';
export { SAVED_OBJECT_TYPES, checkSavedObject } from './types/saved-objects';
export type * from './types/ilm';
export type * from './types/config';
