/**
 * @fileoverview Advisor assembly
 *
 * Wires a boundary loader, the lifecycle and the query facade together.
 * Without a loader the in-process boundary is used.
 */

import type { AdvisorConfigInput, FacadeOptionsInput, LifecycleOptionsInput } from './config/schema.js';
import { globalEventBus, type AdvisorEventBus } from './events.js';
import type { FallbackResponseGenerator } from './fallback/canned_fallback.js';
import { SystemLifecycle, type LifecycleState } from './lifecycle/system_lifecycle.js';
import { InProcessBoundary, type InProcessBoundaryOptions } from './native/in_process_boundary.js';
import type { NativeBoundaryLoader } from './native/types.js';
import { QueryFacade } from './query/query_facade.js';

export interface AdvisorOptions {
  loader?: NativeBoundaryLoader;
  /** Options for the default in-process boundary; ignored with a custom loader. */
  boundary?: InProcessBoundaryOptions;
  lifecycle?: LifecycleOptionsInput;
  facade?: FacadeOptionsInput;
  fallback?: FallbackResponseGenerator | null;
  events?: AdvisorEventBus;
}

export interface Advisor {
  readonly lifecycle: SystemLifecycle;
  readonly facade: QueryFacade;
  readonly events: AdvisorEventBus;
  initialize(config: AdvisorConfigInput): Promise<LifecycleState>;
  shutdown(): void;
}

export function createAdvisor(options: AdvisorOptions = {}): Advisor {
  const events = options.events ?? globalEventBus;
  const loader = options.loader ?? (() => new InProcessBoundary(options.boundary));
  const lifecycle = new SystemLifecycle({ loader, events, options: options.lifecycle });
  const facade = new QueryFacade({ lifecycle, events, fallback: options.fallback, options: options.facade });
  return {
    lifecycle,
    facade,
    events,
    initialize: (config) => lifecycle.initialize(config),
    shutdown: () => lifecycle.teardown(),
  };
}
