import express from 'express';
import swaggerUi from 'swagger-ui-express';
import type { AttendanceSession } from './attendance/session.js';
import { AttendanceError } from './errors.js';
import type { AppConfig } from './config.js';
import { openapiSpec } from './docs/openapi.js';
import { requestLogger } from './middleware/logger.js';
import { secureHeaders } from './middleware/secureHeaders.js';
import { createAttendanceRouter } from './routes/attendance.js';
import type { ErrorResponse, VerifyResponse } from './types.js';

export type AppDeps = {
    session: AttendanceSession;
    config: Pick<
        AppConfig,
        'nodeEnv' | 'verifyRateLimitWindowMs' | 'verifyRateLimitMax' | 'attendanceLogWhitelist'
    >;
};

const ENDPOINTS = {
    'GET /api/get-current-code': 'Fetch the current secret code for attendance.',
    'POST /api/verify-attendance': 'Submit a student_id and code to be marked present.',
    'GET /api/get-attendance-log': 'View the list of students currently marked as present.',
};

// body-parser failures carry an http status and a `type`
function statusOf(err: unknown): number | undefined {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        return err.status;
    }
    return undefined;
}

const CLIENT_ERRORS: Record<number, ErrorResponse['error']> = {
    400: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
    413: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
    415: { code: 'UNSUPPORTED_MEDIA_TYPE', message: 'Unsupported request body encoding' },
};

export function createApp({ session, config }: AppDeps) {
    const app = express();
    app.set('trust proxy', 'loopback, linklocal, uniquelocal');
    app.use(express.json({ limit: '16kb' }));
    app.use(requestLogger);
    app.use(secureHeaders({ hsts: config.nodeEnv === 'production' }));

    app.get('/', async (_req, res, next) => {
        try {
            res.json({
                status: 'online',
                message: 'Welcome to the rotating attendance code API!',
                kv_status: await session.storeStatus(),
                endpoints: ENDPOINTS,
            });
        } catch (err) {
            next(err);
        }
    });

    app.get('/health', (_req, res) => res.json({ data: { ok: true } }));

    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec));

    app.use('/api', createAttendanceRouter(session, config));

    // Error fallback
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof AttendanceError && err.code === 'MISSING_FIELD') {
            const body: VerifyResponse = { status: 'FAILED', message: err.message };
            return res.status(400).json(body);
        }
        if (err instanceof AttendanceError && err.code === 'STORE_UNAVAILABLE') {
            // eslint-disable-next-line no-console
            console.error(
                JSON.stringify({
                    level: 'error',
                    event: 'store_error',
                    requestId: res.locals.requestId,
                    url: req.originalUrl,
                    details: err.details,
                })
            );
            const body: ErrorResponse = { error: { code: err.code, message: err.message } };
            return res.status(503).json(body);
        }
        const status = statusOf(err);
        if (status !== undefined && status >= 400 && status < 500) {
            const body: ErrorResponse = {
                error: CLIENT_ERRORS[status] ?? { code: 'BAD_REQUEST', message: 'Request could not be processed' },
            };
            return res.status(status).json(body);
        }
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ level: 'error', event: 'unhandled', requestId: res.locals.requestId, message: String(err) }));
        const body: ErrorResponse = { error: { code: 'INTERNAL_ERROR', message: 'Unexpected error' } };
        return res.status(500).json(body);
    });

    return app;
}
