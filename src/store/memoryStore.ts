/**
 * In-process store for tests. Rotation replaces the code record and the
 * present-set in one synchronous step, the same guarantee the Redis
 * transaction gives.
 */

import { StoreUnavailableError } from '../errors.js';
import type { CodeRecord } from '../types.js';
import type { AttendanceStore } from './attendanceStore.js';

export class MemoryAttendanceStore implements AttendanceStore {
    private record: CodeRecord | null = null;
    private present = new Set<string>();
    private available = true;

    setAvailable(available: boolean) {
        this.available = available;
    }

    private check() {
        if (!this.available) throw new StoreUnavailableError('memory store offline');
    }

    async readCode(): Promise<string | null> {
        this.check();
        return this.record?.code ?? null;
    }

    async readRotatedAt(): Promise<number> {
        this.check();
        return this.record?.rotatedAt ?? 0;
    }

    async rotate(code: string, rotatedAt: number): Promise<void> {
        this.check();
        this.record = { code, rotatedAt };
        this.present = new Set();
    }

    async markPresent(identity: string): Promise<void> {
        this.check();
        this.present.add(identity);
    }

    async listPresent(): Promise<string[]> {
        this.check();
        return Array.from(this.present);
    }

    async ping(): Promise<boolean> {
        return this.available;
    }
}
