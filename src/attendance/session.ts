import crypto from 'node:crypto';
import { MissingFieldError } from '../errors.js';
import type { AttendanceStore } from '../store/attendanceStore.js';
import type { StoreStatus, SubmitResult } from '../types.js';

export const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const CODE_LENGTH = 8;
export const REJECT_REASON = 'Incorrect or expired code.';

// 8 chars over A-Z0-9; a short-lived shared code, not a key.
export function generateCode(): string {
    let out = '';
    for (let i = 0; i < CODE_LENGTH; i++) {
        out += CODE_ALPHABET[crypto.randomInt(CODE_ALPHABET.length)];
    }
    return out;
}

export type AttendanceSessionOpts = {
    store: AttendanceStore;
    rotationIntervalSeconds: number;
    /** Milliseconds since epoch. */
    now?: () => number;
    generate?: () => string;
};

/**
 * Rotating attendance code over an external store. Holds no state of its own
 * between calls apart from the optional rotation timer.
 */
export class AttendanceSession {
    private store: AttendanceStore;
    private intervalSeconds: number;
    private now: () => number;
    private generate: () => string;
    private rotationTimer?: NodeJS.Timeout;

    constructor(opts: AttendanceSessionOpts) {
        this.store = opts.store;
        this.intervalSeconds = opts.rotationIntervalSeconds;
        this.now = opts.now ?? Date.now;
        this.generate = opts.generate ?? generateCode;
    }

    private nowSeconds(): number {
        return this.now() / 1000;
    }

    async resolveActiveCode(): Promise<string> {
        const rotatedAt = await this.store.readRotatedAt();
        const now = this.nowSeconds();
        const stale = now - rotatedAt > this.intervalSeconds;
        if (!stale) {
            const current = await this.store.readCode();
            if (current) return current;
        }
        const code = this.generate();
        await this.store.rotate(code, now);
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ level: 'info', event: 'code_rotated', rotatedAt: now }));
        return code;
    }

    /** Checks against the stored code only; never rotates. */
    async submit(identity: string, code: string): Promise<SubmitResult> {
        if (!identity) throw new MissingFieldError('student_id');
        if (!code) throw new MissingFieldError('code');
        const current = await this.store.readCode();
        if (current === null || current !== code) {
            // eslint-disable-next-line no-console
            console.log(JSON.stringify({ level: 'info', event: 'attendance_rejected', identity }));
            return { outcome: 'rejected', reason: REJECT_REASON };
        }
        await this.store.markPresent(identity);
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ level: 'info', event: 'attendance_accepted', identity }));
        return { outcome: 'accepted' };
    }

    async listPresent(): Promise<string[]> {
        const members = await this.store.listPresent();
        return members.sort();
    }

    async storeStatus(): Promise<StoreStatus> {
        return (await this.store.ping()) ? 'connected' : 'disconnected';
    }

    startRotationTimer() {
        if (this.rotationTimer) return;
        const period = Math.max(1000, this.intervalSeconds * 1000);
        this.rotationTimer = setInterval(() => {
            this.resolveActiveCode().catch((err: unknown) => {
                // eslint-disable-next-line no-console
                console.error(JSON.stringify({ level: 'error', event: 'rotation_tick_failed', message: String(err) }));
            });
        }, period);
        this.rotationTimer.unref();
    }

    stopRotationTimer() {
        if (!this.rotationTimer) return;
        clearInterval(this.rotationTimer);
        this.rotationTimer = undefined;
    }
}
