import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description: 'Checks that storage is reachable',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              storage: { type: 'boolean', example: true },
            },
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for pipeline statistics
 */
export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get pipeline statistics',
      description: 'Ingestion counters and outbox backlog',
    }),
    ApiResponse({
      status: 200,
      description: 'Pipeline statistics',
      schema: {
        type: 'object',
        properties: {
          ingestion: {
            type: 'object',
            properties: {
              paymentEvents: { type: 'object', additionalProperties: { type: 'number' } },
              disputeEvents: { type: 'object', additionalProperties: { type: 'number' } },
              ledgerEntries: { type: 'object', additionalProperties: { type: 'number' } },
              totalEvents: { type: 'number' },
            },
          },
          outbox: {
            type: 'object',
            properties: {
              pending: { type: 'number' },
              delivered: { type: 'number' },
              failed: { type: 'number' },
              dead_letter: { type: 'number' },
            },
          },
          runtime: {
            type: 'object',
            properties: {
              uptime: { type: 'number' },
              node: { type: 'string', example: 'v20.11.0' },
            },
          },
        },
      },
    }),
  );
};
