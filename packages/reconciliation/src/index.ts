export { ReconciliationEngine } from './engine.js';
export type { EngineResult, ReconciliationEngineOptions } from './engine.js';
export { reconcile, indexByJobId } from './reconcile.js';
export { COMPARED_FIELDS, changedFields, hasChanged } from './compare.js';
export type { ComparedField } from './compare.js';
export { loadRegistry, saveRegistry, acquireRegistryLock, DEFAULT_LOCK_STALE_MS } from './registry-store.js';
export type { AcquireLockOptions, LoadedRegistry, RegistryLoadState, RegistryLock } from './registry-store.js';
export { PersistenceError, RegistryLockError } from './errors.js';
export type { PersistenceFailure } from './errors.js';
export type { EventType, PostingEvent, ReconcileResult, ReconcileSummary } from './types.js';
