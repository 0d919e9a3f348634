import { Logger } from '@nestjs/common';
import {
  DispatchedEvent,
  EventDispatcher,
  EventHandler,
  EventSubscription,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Supports multiple handlers per event type plus catch-all handlers.
 * A failing handler never stops the others.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  on(eventType: string, handler: EventHandler): EventSubscription {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  onAll(handler: EventHandler): EventSubscription {
    this.globalHandlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  async dispatch(eventType: string, event: DispatchedEvent): Promise<void> {
    const { errors } = await this.dispatchAndWait(eventType, event);

    for (const error of errors) {
      this.logger.error(
        `Handler failed for ${eventType} (${event.id}): ${error.message}`,
        error.stack,
      );
    }
  }

  async dispatchAndWait(
    eventType: string,
    event: DispatchedEvent,
  ): Promise<{ success: boolean; errors: Error[] }> {
    const results = await Promise.allSettled(
      this.handlersFor(eventType).map(async (handler) => handler(eventType, event)),
    );

    const errors: Error[] = [];
    for (const result of results) {
      if (result.status === 'rejected') {
        errors.push(
          result.reason instanceof Error ? result.reason : new Error(String(result.reason)),
        );
      }
    }

    return {
      success: errors.length === 0,
      errors,
    };
  }

  getHandlerCount(eventType?: string): number {
    if (eventType) {
      return (this.handlers.get(eventType)?.size ?? 0) + this.globalHandlers.size;
    }
    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }

  private handlersFor(eventType: string): EventHandler[] {
    return [...(this.handlers.get(eventType) ?? []), ...this.globalHandlers];
  }
}
