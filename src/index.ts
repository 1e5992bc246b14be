/**
 * @file Public API
 *
 * @module analysis-flow
 */

export * from './errors.js';

export { AnalysisStep, step_create, slots_required, config_effective, texts_sample } from './steps/AnalysisStep.js';
export { result_shape, allocation_compute } from './steps/results.js';
export { StepConfigSchema, StepResultSchema } from './steps/schemas.js';
export type * from './steps/types.js';
export { STEP_KINDS, INPUT_SLOTS, stepKind_is } from './steps/types.js';

export { Job, transientFault_is } from './jobs/Job.js';
export { DEFAULT_JOB_OPTIONS, TERMINAL_STATUSES } from './jobs/types.js';
export type { JobOptions, JobStatus, JobSnapshot, WaitOptions } from './jobs/types.js';

export { Sha256Hasher, canonical_serialize, contentIdentity_compute, fingerprint_compute, fingerprint_record } from './dag/fingerprint/hasher.js';
export type { FingerprintHasher, FingerprintRecord } from './dag/fingerprint/types.js';

export { MemoCache } from './dag/store/MemoCache.js';
export { ResultStore } from './dag/store/ResultStore.js';
export { FileCacheBackend } from './dag/store/backend/fs.js';
export type { CacheBackend, CacheResolution, CacheSource, CacheStats, ResultLookup } from './dag/store/types.js';

export { WorkflowBuilder, type StepWiring } from './dag/graph/WorkflowBuilder.js';
export { graph_build, plan_build } from './dag/graph/builder.js';
export { dag_validate } from './dag/graph/validator.js';
export { order_compute, readiness_resolve, adjacency_compute, upstream_list, downstream_list } from './dag/graph/resolver.js';
export { workflow_parse, workflow_load, type ParsedWorkflow } from './dag/graph/parser/workflow.js';
export { PRIMARY_SOURCE, DEFAULT_AUTO_INSERT_POLICY } from './dag/graph/types.js';
export type {
    AutoInsertPolicy,
    ExecutionGraph,
    ExecutionPlan,
    SourceDeclaration,
    StepDefaults,
    ValidationResult,
    Workflow,
} from './dag/graph/types.js';

export { Scheduler } from './dag/scheduler/Scheduler.js';
export type { FailurePolicy, RunOptions, RunReport, SchedulerOptions, StepOutcome } from './dag/scheduler/types.js';

export { HttpTransport, type HttpTransportOptions } from './transport/HttpTransport.js';
export { MockTransport, type MockTransportOptions } from './transport/MockTransport.js';
export type { RemoteTransport, SubmitOutcome, JobStatusReport, RemoteJobStatus } from './transport/types.js';

export { TelemetryBus, type RunEvent, type RunObserver } from './telemetry/TelemetryBus.js';
export { consoleLogger_attach } from './telemetry/console.js';

export {
    FAST_DATASET_LIMIT,
    texts_load,
    sentiment_analysis,
    theme_allocation,
    cluster_analysis,
    type TextSource,
    type SentimentResult,
    type AllocationResult,
    type ClusterResult,
} from './starters.js';

export { SettingsService, env_load, jobOptions_derive, type EngineSettings } from './config/settings.js';
