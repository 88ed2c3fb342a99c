export const KEYS = {
    code: 'secret_code',
    timestamp: 'secret_timestamp',
    present: 'attendance_log',
} as const;

/**
 * Durable state behind the attendance session. Implementations reject with
 * StoreUnavailableError when the backend cannot be reached.
 */
export interface AttendanceStore {
    readCode(): Promise<string | null>;
    /** Seconds since epoch of the last rotation, 0 when never rotated. */
    readRotatedAt(): Promise<number>;
    /** Sets code and timestamp and clears the present-set as one unit. */
    rotate(code: string, rotatedAt: number): Promise<void>;
    markPresent(identity: string): Promise<void>;
    listPresent(): Promise<string[]>;
    ping(): Promise<boolean>;
}

export function parseTimestamp(raw: string | null): number {
    if (raw === null) return 0;
    const value = Number(raw);
    return Number.isFinite(value) ? value : 0;
}
