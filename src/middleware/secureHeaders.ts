import type { NextFunction, Request, Response } from 'express';

type SecureHeadersOpts = {
    // HSTS is only sent when enabled and the proxy reports https
    hsts: boolean;
};

export function secureHeaders(opts: SecureHeadersOpts) {
    return (req: Request, res: Response, next: NextFunction) => {
        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('X-Frame-Options', 'DENY');
        res.setHeader('Referrer-Policy', 'no-referrer');
        res.setHeader('Cache-Control', 'no-store');
        if (opts.hsts && req.header('x-forwarded-proto') === 'https') {
            res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
        }
        next();
    };
}
