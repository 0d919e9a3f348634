import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Replaces the parsed body with the exact bytes received, which signature
 * verification needs. Requires the app to be created with `rawBody: true`.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();
    request.body = readRawBody(request);
    return next.handle();
  }
}

export function readRawBody(
  request: Pick<RawBodyRequest<Request>, 'rawBody' | 'body'>,
): Buffer {
  if (request.rawBody) {
    return request.rawBody;
  }
  const body: unknown = request.body;
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'string') {
    return Buffer.from(body);
  }
  // No body parser ran for this content type
  return Buffer.alloc(0);
}
