/**
 * Delivery of outbox events to in-process subscribers
 */

export { EventDispatcherImpl } from './event-dispatcher.impl';

export { LoggingEventHandler, LoggingLevel } from './handlers/logging.handler';
export {
  IngestionMetrics,
  IngestionMetricsSnapshot,
} from './handlers/ingestion-metrics';
