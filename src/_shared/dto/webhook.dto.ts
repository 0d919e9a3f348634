import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Response DTO for webhook ingestion
 */
export class WebhookResponseDto {
  @ApiProperty({
    description: 'What happened to the webhook',
    enum: ['processed', 'ignored', 'duplicate'],
    example: 'processed',
  })
  outcome!: 'processed' | 'ignored' | 'duplicate';

  @ApiPropertyOptional({
    description: 'Which processor handled the event',
    enum: ['payment', 'dispute'],
    example: 'payment',
  })
  kind?: 'payment' | 'dispute';

  @ApiProperty({ description: 'Provider that sent the webhook', example: 'stripe' })
  provider!: string;

  @ApiPropertyOptional({
    description: 'Tenant whose credentials verified the webhook',
    example: 'tenant_a',
  })
  tenantId?: string;

  @ApiPropertyOptional({
    description: 'Provider event identifier',
    example: 'evt_1',
  })
  providerEventId?: string;

  @ApiProperty({
    description: 'Human-readable processing message',
    example: 'Event processed',
  })
  message!: string;
}

/**
 * Error body for rejected webhooks
 */
export class WebhookErrorDto {
  @ApiProperty({ example: 401 })
  statusCode!: number;

  @ApiProperty({ example: 'invalid webhook signature' })
  message!: string;

  @ApiProperty({
    description: 'Error class raised by the pipeline',
    example: 'InvalidSignatureError',
  })
  error!: string;
}
