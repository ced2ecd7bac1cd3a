import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Express 4 does not await handlers; route rejections to the error handler.
 */
export const asyncHandler =
    (handler: AsyncRequestHandler): RequestHandler =>
    (req, res, next) => {
        handler(req, res, next).catch(next);
    };
