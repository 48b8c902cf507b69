import { logError } from './telemetry/logger.js';
import { getErrorMessage } from './utils/errors.js';
import type { QueryKind } from './types.js';

// ============================================================================
// EVENT TYPES
// ============================================================================

export type NativeCallOutcome = 'ok' | 'error' | 'timeout' | 'cancelled';

export type AdvisorEvent =
  | { type: 'lifecycle_state_changed'; timestamp: Date; data: { from: string; to: string; reason?: string } }
  | { type: 'native_call_started'; timestamp: Date; data: { callId: number; operation: string; streaming: boolean } }
  | { type: 'native_call_finished'; timestamp: Date; data: { callId: number; operation: string; outcome: NativeCallOutcome } }
  | { type: 'stream_superseded'; timestamp: Date; data: { conversationId: string; supersededStreamId: number } }
  | { type: 'fallback_used'; timestamp: Date; data: { kind: QueryKind; streaming: boolean; lifecycle: string } };

export type AdvisorEventType = AdvisorEvent['type'];

export type AdvisorEventHandler = (event: AdvisorEvent) => void | Promise<void>;

// ============================================================================
// EVENT BUS
// ============================================================================

/**
 * In-process event bus. Handlers run synchronously in registration order;
 * a handler that throws or rejects is logged and never affects the emitter.
 */
export class AdvisorEventBus {
  private handlers = new Map<AdvisorEventType | '*', Set<AdvisorEventHandler>>();

  on(eventType: AdvisorEventType | '*', handler: AdvisorEventHandler): () => void {
    let set = this.handlers.get(eventType);
    if (!set) {
      set = new Set();
      this.handlers.set(eventType, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }

  once(eventType: AdvisorEventType | '*', handler: AdvisorEventHandler): () => void {
    const wrappedHandler: AdvisorEventHandler = (event) => {
      this.handlers.get(eventType)?.delete(wrappedHandler);
      return handler(event);
    };
    return this.on(eventType, wrappedHandler);
  }

  emit(event: AdvisorEvent): void {
    this.dispatch(this.handlers.get(event.type), event);
    this.dispatch(this.handlers.get('*'), event);
  }

  off(eventType: AdvisorEventType | '*'): void { this.handlers.delete(eventType); }
  clear(): void { this.handlers.clear(); }

  private dispatch(handlers: Set<AdvisorEventHandler> | undefined, event: AdvisorEvent): void {
    if (!handlers) return;
    for (const handler of [...handlers]) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            logError(`Advisor event handler error for ${event.type}`, {
              error: getErrorMessage(error),
            });
          });
        }
      } catch (error: unknown) {
        logError(`Advisor event handler error for ${event.type}`, {
          error: getErrorMessage(error),
        });
      }
    }
  }
}

export const globalEventBus = new AdvisorEventBus();

export function createLifecycleStateChangedEvent(from: string, to: string, reason?: string): AdvisorEvent {
  return { type: 'lifecycle_state_changed', timestamp: new Date(), data: reason ? { from, to, reason } : { from, to } };
}

export function createNativeCallStartedEvent(callId: number, operation: string, streaming: boolean): AdvisorEvent {
  return { type: 'native_call_started', timestamp: new Date(), data: { callId, operation, streaming } };
}

export function createNativeCallFinishedEvent(callId: number, operation: string, outcome: NativeCallOutcome): AdvisorEvent {
  return { type: 'native_call_finished', timestamp: new Date(), data: { callId, operation, outcome } };
}

export function createStreamSupersededEvent(conversationId: string, supersededStreamId: number): AdvisorEvent {
  return { type: 'stream_superseded', timestamp: new Date(), data: { conversationId, supersededStreamId } };
}

export function createFallbackUsedEvent(kind: QueryKind, streaming: boolean, lifecycle: string): AdvisorEvent {
  return { type: 'fallback_used', timestamp: new Date(), data: { kind, streaming, lifecycle } };
}
