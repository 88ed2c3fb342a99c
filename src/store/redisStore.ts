import { Redis } from 'ioredis';
import { StoreUnavailableError } from '../errors.js';
import { type AttendanceStore, KEYS, parseTimestamp } from './attendanceStore.js';

export type RedisClientOpts = {
    url: string;
    commandTimeoutMs: number;
};

export function createRedisClient(opts: RedisClientOpts): Redis {
    const client = new Redis(opts.url, {
        commandTimeout: opts.commandTimeoutMs,
        connectTimeout: opts.commandTimeoutMs,
        maxRetriesPerRequest: 1,
    });
    client.on('error', (err: Error) => {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ level: 'error', event: 'store_error', message: err.message }));
    });
    return client;
}

export type RedisCommands = Pick<Redis, 'get' | 'multi' | 'sadd' | 'smembers' | 'ping'>;

export class RedisAttendanceStore implements AttendanceStore {
    constructor(private client: RedisCommands) {}

    private async guard<T>(op: () => Promise<T>): Promise<T> {
        try {
            return await op();
        } catch (err) {
            if (err instanceof StoreUnavailableError) throw err;
            throw new StoreUnavailableError(String(err));
        }
    }

    readCode(): Promise<string | null> {
        return this.guard(() => this.client.get(KEYS.code));
    }

    readRotatedAt(): Promise<number> {
        return this.guard(async () => parseTimestamp(await this.client.get(KEYS.timestamp)));
    }

    rotate(code: string, rotatedAt: number): Promise<void> {
        return this.guard(async () => {
            const results = await this.client
                .multi()
                .set(KEYS.code, code)
                .set(KEYS.timestamp, String(rotatedAt))
                .del(KEYS.present)
                .exec();
            // exec resolves null when the transaction was discarded
            if (!results) throw new StoreUnavailableError('rotation transaction aborted');
            const failed = results.find(([err]) => err);
            if (failed) throw new StoreUnavailableError(String(failed[0]));
        });
    }

    markPresent(identity: string): Promise<void> {
        return this.guard(async () => {
            await this.client.sadd(KEYS.present, identity);
        });
    }

    listPresent(): Promise<string[]> {
        return this.guard(() => this.client.smembers(KEYS.present));
    }

    async ping(): Promise<boolean> {
        try {
            return (await this.client.ping()) === 'PONG';
        } catch {
            return false;
        }
    }
}
