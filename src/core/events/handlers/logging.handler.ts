import { Logger } from '@nestjs/common';
import { DispatchedEvent, EventHandler } from '../../interfaces';

export type LoggingLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logs every delivered event
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Pick<Logger, 'log'> = new Logger('KassaEvents'),
    private readonly logLevel: LoggingLevel = 'normal',
  ) {}

  getHandler(): EventHandler {
    return (eventType: string, event: DispatchedEvent) => {
      this.logger.log(this.format(eventType, event));
    };
  }

  format(eventType: string, event: DispatchedEvent): string {
    switch (this.logLevel) {
      case 'minimal':
        return `${eventType} ${event.id}`;
      case 'verbose':
        return `${eventType} ${event.id} tenant=${event.tenantId} payload=${JSON.stringify(event.payload)}`;
      case 'normal':
      default:
        return `${eventType} ${event.id} tenant=${event.tenantId} source=${event.payload.source_type}/${event.payload.source_id}`;
    }
  }
}
