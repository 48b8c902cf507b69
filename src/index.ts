/**
 * @fileoverview Fiqh Advisor bridge
 *
 * Host-side bridge between presentation code and the native advisory
 * subsystem: bounded startup with a degraded mode, one audited adapter for
 * the native future protocol, cumulative streaming, and offline fallback
 * answers whenever the native side is not ready.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createAdvisor, loadConfigFromEnv } from 'fiqh-advisor-bridge';
 *
 * const advisor = createAdvisor();
 * await advisor.initialize(loadConfigFromEnv());
 *
 * const result = await advisor.facade.analyze({ kind: 'token', payload: 'SOL', language: 'en' });
 * if (result.ok) console.log(result.value.text);
 *
 * advisor.facade.analyzeStream(
 *   { kind: 'chat_message', payload: 'What is riba?', language: 'en' },
 *   {
 *     onChunk: (text) => render(text),
 *     onComplete: (response) => render(response.text),
 *     onError: (error) => showError(error.message),
 *   }
 * );
 * ```
 *
 * @packageDocumentation
 */

export { ADVISOR_VERSION } from './version.js';

export * from './types.js';
export * from './core/index.js';
export * from './config/index.js';

export {
  AdvisorEventBus,
  globalEventBus,
  createLifecycleStateChangedEvent,
  createNativeCallStartedEvent,
  createNativeCallFinishedEvent,
  createStreamSupersededEvent,
  createFallbackUsedEvent,
  type AdvisorEvent,
  type AdvisorEventType,
  type AdvisorEventHandler,
  type NativeCallOutcome,
} from './events.js';

export { createAdvisor, type Advisor, type AdvisorOptions } from './advisor.js';

export {
  SystemLifecycle,
  type LifecycleState,
  type LifecycleStatus,
  type LifecycleDescription,
  type NativeChannel,
  type SystemLifecycleDeps,
} from './lifecycle/system_lifecycle.js';

export {
  NativeCallAdapter,
  type AwaitFutureOptions,
  type CallOptions,
  type StreamCallbacks,
  type StreamSubscription,
} from './native/future_adapter.js';
export { loadNativeBoundary, missingEntryPoints, isNativeBoundary } from './native/loader.js';
export { liftQueryRecord, NativeQueryRecordSchema } from './native/records.js';
export { InProcessBoundary, type InProcessBoundaryOptions, type BoundaryStats } from './native/in_process_boundary.js';
export * from './native/types.js';

export { ChunkAggregator } from './streaming/chunk_aggregator.js';

export {
  QueryFacade,
  OPERATION_FOR_KIND,
  FALLBACK_AGENT_NAME,
  conversationKey,
  type AnalyzeOptions,
  type QueryFacadeDeps,
  type StreamTicket,
} from './query/query_facade.js';

export * from './fallback/index.js';

export { AdvisoryEngine, type AdvisoryEngineOptions } from './engine/advisory_engine.js';
export {
  MockAdvisoryAgent,
  LlmAdvisoryAgent,
  type AdvisoryAgent,
  type AgentAnswer,
  type AgentContext,
} from './engine/agents.js';
export { AnalysisHistoryStore, type AnalysisRecord, type HistoryStats } from './engine/history_store.js';

export * from './adapters/index.js';

export {
  runDiagnostics,
  summarizeChecks,
  type CheckStatus,
  type DiagnosticCheck,
  type DiagnosticsOptions,
  type DiagnosticsReport,
} from './diagnostics/system_diagnostics.js';

export { logInfo, logWarning, logError, logDebug, createLogger, type ScopedLogger } from './telemetry/logger.js';
