// utils/asyncHandler.ts
import { RequestHandler } from 'express';

type AsyncRequestHandler = (...args: Parameters<RequestHandler>) => Promise<void>;

/**
 * Adapts an async controller to Express 4, which ignores returned promises:
 * a rejection is handed to `next` so the error middleware answers the request.
 */
const asyncHandler = (handler: AsyncRequestHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export default asyncHandler;
