import { LedgerEntryCreatedPayload } from '../domain/models';

/**
 * Envelope handed to subscribers when an outbox event is delivered
 */
export interface DispatchedEvent {
  id: string;
  tenantId: string;
  eventType: string;
  payload: LedgerEntryCreatedPayload;
  createdAt: Date;
}

/**
 * Event handler function signature
 */
export type EventHandler = (
  eventType: string,
  event: DispatchedEvent,
) => Promise<void> | void;

export interface EventSubscription {
  id: string;
  unsubscribe(): void;
}

/**
 * Event dispatcher interface - fans delivered outbox events out to handlers
 */
export interface EventDispatcher {
  on(eventType: string, handler: EventHandler): EventSubscription;

  /**
   * Register a handler for every event type
   */
  onAll(handler: EventHandler): EventSubscription;

  off(eventType: string, handler: EventHandler): void;

  /**
   * Fire and forget; handler failures are logged, never thrown
   */
  dispatch(eventType: string, event: DispatchedEvent): Promise<void>;

  /**
   * Run every handler and report failures to the caller
   */
  dispatchAndWait(
    eventType: string,
    event: DispatchedEvent,
  ): Promise<{ success: boolean; errors: Error[] }>;

  getHandlerCount(eventType?: string): number;
}
