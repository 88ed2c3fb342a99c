import { Router } from 'express';
import { z } from 'zod';
import type { AttendanceSession } from '../attendance/session.js';
import { validateBody } from '../middleware/validate.js';
import { rateLimit } from '../middleware/rateLimit.js';
import { ipWhitelist } from '../middleware/ipWhitelist.js';
import type { VerifyResponse } from '../types.js';

export type AttendanceRouterOpts = {
    verifyRateLimitWindowMs: number;
    verifyRateLimitMax: number;
    attendanceLogWhitelist: string[];
};

const MISSING_FIELDS_MESSAGE = 'Missing student_id or code.';
const INVALID_FIELDS_MESSAGE = 'student_id must be a string or number and code must be a string.';
const MISMATCH_MESSAGE = 'Incorrect or expired code. Proxy attempt detected?';

// Numeric ids are recorded as their string form; 0 counts as absent.
const verifySchema = z.object({
    student_id: z
        .union([z.string().min(1), z.number().refine((n) => n !== 0, 'student_id is empty')])
        .transform(String),
    code: z.string().min(1),
});

function isAbsent(issue: z.ZodIssue): boolean {
    if (issue.code === 'too_small' || issue.code === 'custom') return true;
    return issue.code === 'invalid_type' && (issue.received === 'undefined' || issue.received === 'null');
}

export function describeVerifyError(error: z.ZodError): string {
    const issues = error.issues.flatMap((issue) =>
        issue.code === 'invalid_union' ? issue.unionErrors.flatMap((e) => e.issues) : [issue]
    );
    return issues.some(isAbsent) ? MISSING_FIELDS_MESSAGE : INVALID_FIELDS_MESSAGE;
}

export function createAttendanceRouter(session: AttendanceSession, opts: AttendanceRouterOpts): Router {
    const router = Router();

    router.get('/get-current-code', async (_req, res, next) => {
        try {
            const secret = await session.resolveActiveCode();
            res.json({ secret_code: secret });
        } catch (err) {
            next(err);
        }
    });

    router.post(
        '/verify-attendance',
        rateLimit({
            windowMs: opts.verifyRateLimitWindowMs,
            max: opts.verifyRateLimitMax,
            errorMessage: 'Too many attendance submissions',
        }),
        validateBody(verifySchema, describeVerifyError),
        async (req, res, next) => {
            const { student_id, code } = req.body as z.infer<typeof verifySchema>;
            try {
                const result = await session.submit(student_id, code);
                if (result.outcome === 'rejected') {
                    const body: VerifyResponse = { status: 'FAILED', message: MISMATCH_MESSAGE };
                    return res.status(403).json(body);
                }
                const body: VerifyResponse = {
                    status: 'SUCCESS',
                    message: `Welcome, ${student_id}. Your attendance is confirmed.`,
                };
                return res.json(body);
            } catch (err) {
                next(err);
            }
        }
    );

    // professor view
    router.get('/get-attendance-log', ipWhitelist(opts.attendanceLogWhitelist), async (_req, res, next) => {
        try {
            const present = await session.listPresent();
            res.json({ present_students: present });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
