import type { NextFunction, Request, Response } from 'express';
import type { ZodError, ZodSchema } from 'zod';
import type { VerifyResponse } from '../types.js';

export function validateBody(schema: ZodSchema, describe: (error: ZodError) => string) {
    return (req: Request, res: Response, next: NextFunction) => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            const body: VerifyResponse = { status: 'FAILED', message: describe(result.error) };
            return res.status(400).json(body);
        }
        req.body = result.data;
        next();
    };
}
