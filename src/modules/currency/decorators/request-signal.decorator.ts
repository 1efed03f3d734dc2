import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request, Response } from 'express';

/**
 * AbortSignal that fires when the client goes away before the response
 * has been written.
 */
export const RequestSignal = createParamDecorator((_data: unknown, ctx: ExecutionContext): AbortSignal => {
  const http = ctx.switchToHttp();
  const request = http.getRequest<Request>();
  const response = http.getResponse<Response>();
  const controller = new AbortController();

  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort(new Error(`Client closed ${request.method} ${request.originalUrl}`));
    }
  });

  return controller.signal;
});
