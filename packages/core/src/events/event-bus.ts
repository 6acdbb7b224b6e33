/**
 * Typed in-process event bus.
 *
 * Replaces an implicit process-wide notification channel with an explicitly
 * constructed bus that is passed to every producer and consumer. Events are
 * discriminated on `kind`; handlers receive the narrowed event type.
 *
 * @example
 * ```ts
 * type AppEvent =
 *   | { kind: 'remote-store-changed'; receivedAt: number }
 *   | { kind: 'clipboard-data-changed'; receivedAt: number };
 *
 * const bus = createEventBus<AppEvent>();
 *
 * const unsubscribe = bus.subscribe('clipboard-data-changed', (event) => {
 *   refreshHistory(event.receivedAt);
 * });
 *
 * bus.publish({ kind: 'clipboard-data-changed', receivedAt: Date.now() });
 * unsubscribe();
 * ```
 *
 * @module events/event-bus
 */

import { Subject, filter, type Observable, type Subscription } from 'rxjs';
import { noopLogger, type Logger } from '../observability/logger.js';

// ── Types ─────────────────────────────────────────────────

/** Base shape every bus event extends */
export interface BusEvent {
  readonly kind: string;
}

/** Handler for one event kind */
export type EventHandler<E extends BusEvent, K extends E['kind']> = (
  event: Extract<E, { kind: K }>
) => void | Promise<void>;

export interface EventBusConfig {
  /** Logger for handler failures (default: silent) */
  logger?: Logger;
}

/** Diagnostics emitted by the bus itself */
export type EventBusDiagnostic =
  | { type: 'published'; kind: string }
  | { type: 'handler_error'; kind: string; error: string };

// ── Event Bus ─────────────────────────────────────────────

export class EventBus<E extends BusEvent> {
  private readonly events$$ = new Subject<E>();
  private readonly diagnostics$$ = new Subject<EventBusDiagnostic>();
  private readonly subscriptions = new Set<Subscription>();
  private readonly logger: Logger;
  private destroyed = false;

  /** Every published event, in publish order */
  readonly events$: Observable<E> = this.events$$.asObservable();

  /** Bus diagnostics (publishes and handler failures) */
  readonly diagnostics$: Observable<EventBusDiagnostic> = this.diagnostics$$.asObservable();

  constructor(config: EventBusConfig = {}) {
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Subscribe to one event kind. Returns an unsubscribe function.
   * A throwing or rejecting handler is logged and does not affect other handlers.
   */
  subscribe<K extends E['kind']>(kind: K, handler: EventHandler<E, K>): () => void {
    this.ensureNotDestroyed();

    const subscription = this.events$$
      .pipe(filter((event): event is Extract<E, { kind: K }> => event.kind === kind))
      .subscribe((event) => {
        this.invoke(kind, () => handler(event));
      });

    this.subscriptions.add(subscription);

    return () => {
      subscription.unsubscribe();
      this.subscriptions.delete(subscription);
    };
  }

  /** Observe one event kind as a stream */
  on<K extends E['kind']>(kind: K): Observable<Extract<E, { kind: K }>> {
    return this.events$$.pipe(
      filter((event): event is Extract<E, { kind: K }> => event.kind === kind)
    );
  }

  /** Publish an event to every subscriber of its kind */
  publish(event: E): void {
    this.ensureNotDestroyed();
    this.diagnostics$$.next({ type: 'published', kind: event.kind });
    this.events$$.next(event);
  }

  /** Number of live handler subscriptions */
  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /** Complete all streams and drop every handler */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions.clear();
    this.events$$.complete();
    this.diagnostics$$.complete();
  }

  private invoke(kind: string, run: () => void | Promise<void>): void {
    const report = (error: unknown): void => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error('Event handler failed', err, { kind });
      this.diagnostics$$.next({ type: 'handler_error', kind, error: err.message });
    };

    try {
      const result = run();
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }

  private ensureNotDestroyed(): void {
    if (this.destroyed) {
      throw new Error('EventBus has been destroyed');
    }
  }
}

/** Create a typed event bus */
export function createEventBus<E extends BusEvent>(config?: EventBusConfig): EventBus<E> {
  return new EventBus<E>(config);
}
