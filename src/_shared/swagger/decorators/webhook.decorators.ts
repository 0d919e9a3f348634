import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody, ApiHeader } from '@nestjs/swagger';
import { WebhookErrorDto, WebhookResponseDto } from '../../dto';

/**
 * Swagger decorator for webhook endpoints
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payment webhook',
      description:
        'Finds the tenant whose credentials verify the signature, then records the payment or dispute event and posts it to the ledger. Redelivered events are acknowledged without reprocessing.',
    }),
    ApiParam({
      name: 'provider',
      description: 'Payment provider name',
      example: 'stripe',
      required: true,
      schema: {
        type: 'string',
        enum: ['stripe', 'adyen', 'braintree'],
      },
    }),
    ApiHeader({
      name: 'stripe-signature',
      description: 'Signature for Stripe webhooks',
      required: false,
      example: 't=1714557600,v1=5257a869e7ec...',
    }),
    ApiBody({
      description:
        'Raw webhook payload: JSON for Stripe and Adyen, form-encoded bt_signature/bt_payload for Braintree',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          id: 'evt_1',
          type: 'payment_intent.succeeded',
          created: 1714557600,
          data: {
            object: {
              id: 'pi_1',
              amount: 2000,
              currency: 'usd',
              metadata: { customer_id: 'cus_1', invoice_id: 'inv_1' },
            },
          },
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Webhook processed, ignored or recognised as a duplicate',
      type: WebhookResponseDto,
    }),
    ApiResponse({
      status: 401,
      description: 'No active configuration verified the signature',
      type: WebhookErrorDto,
    }),
    ApiResponse({
      status: 404,
      description: 'Unknown provider, or no tenant has it configured',
      type: WebhookErrorDto,
    }),
    ApiResponse({
      status: 422,
      description: 'Verified event failed business validation',
      type: WebhookErrorDto,
    }),
    ApiResponse({
      status: 500,
      description: 'Configuration or ledger failure; the provider should retry',
      type: WebhookErrorDto,
    }),
  );
};
