import { beforeEach, describe, expect, it, vi } from 'vitest';
import RedisMock from 'ioredis-mock';
import { AttendanceSession } from '../attendance/session.js';
import { StoreUnavailableError } from '../errors.js';
import { KEYS } from '../store/attendanceStore.js';
import { RedisAttendanceStore } from '../store/redisStore.js';

describe('RedisAttendanceStore', () => {
    const client = new RedisMock();
    let store: RedisAttendanceStore;

    beforeEach(async () => {
        vi.restoreAllMocks();
        await client.flushall();
        store = new RedisAttendanceStore(client);
    });

    it('reads nothing before the first rotation', async () => {
        expect(await store.readCode()).toBeNull();
        expect(await store.readRotatedAt()).toBe(0);
        expect(await store.listPresent()).toEqual([]);
    });

    it('writes code and timestamp and clears the present-set on rotation', async () => {
        await client.sadd(KEYS.present, 'old-1', 'old-2');
        await store.rotate('K7Q2M9XZ', 1700000000.25);

        expect(await client.get(KEYS.code)).toBe('K7Q2M9XZ');
        expect(await client.get(KEYS.timestamp)).toBe('1700000000.25');
        expect(await client.exists(KEYS.present)).toBe(0);
        expect(await store.readRotatedAt()).toBe(1700000000.25);
    });

    it('treats an unparsable timestamp as never rotated', async () => {
        await client.set(KEYS.timestamp, 'not-a-number');
        expect(await store.readRotatedAt()).toBe(0);
    });

    it('adds identities to the set once', async () => {
        await store.markPresent('s2');
        await store.markPresent('s1');
        await store.markPresent('s2');
        expect((await store.listPresent()).sort()).toEqual(['s1', 's2']);
    });

    it('answers ping while connected', async () => {
        expect(await store.ping()).toBe(true);
    });

    it('wraps command failures in StoreUnavailableError', async () => {
        vi.spyOn(client, 'get').mockRejectedValue(new Error('Command timed out'));
        await expect(store.readCode()).rejects.toBeInstanceOf(StoreUnavailableError);
        await expect(store.readRotatedAt()).rejects.toMatchObject({
            code: 'STORE_UNAVAILABLE',
            details: 'Error: Command timed out',
        });
    });

    it('reports a failed ping as not connected', async () => {
        vi.spyOn(client, 'ping').mockRejectedValue(new Error('Connection is closed.'));
        expect(await store.ping()).toBe(false);
    });

    describe('failed rotation', () => {
        const seed = async () => {
            await store.rotate('OLD0CODE', 1000);
            await store.markPresent('alice');
        };

        const failExecWith = (outcome: [Error | null, unknown][] | null) => {
            const startMulti = client.multi.bind(client);
            vi.spyOn(client, 'multi').mockImplementation(() => {
                const tx = startMulti();
                vi.spyOn(tx, 'exec').mockResolvedValue(outcome);
                return tx;
            });
        };

        const expectPriorStateKept = async () => {
            expect(await store.readCode()).toBe('OLD0CODE');
            expect(await store.readRotatedAt()).toBe(1000);
            expect(await store.listPresent()).toEqual(['alice']);
        };

        it('rejects when the transaction is discarded', async () => {
            await seed();
            failExecWith(null);
            await expect(store.rotate('NEW0CODE', 2000)).rejects.toMatchObject({
                code: 'STORE_UNAVAILABLE',
                details: 'rotation transaction aborted',
            });
            await expectPriorStateKept();
        });

        it('rejects when a queued command reports an error', async () => {
            await seed();
            failExecWith([
                [new Error('EXECABORT Transaction discarded'), null],
                [null, 'OK'],
                [null, 1],
            ]);
            await expect(store.rotate('NEW0CODE', 2000)).rejects.toMatchObject({
                code: 'STORE_UNAVAILABLE',
                details: 'Error: EXECABORT Transaction discarded',
            });
            await expectPriorStateKept();
        });

        it('surfaces the failure from resolveActiveCode without handing out the new code', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await seed();
            failExecWith(null);
            const session = new AttendanceSession({
                store,
                rotationIntervalSeconds: 60,
                now: () => 5_000_000,
                generate: () => 'NEW0CODE',
            });
            await expect(session.resolveActiveCode()).rejects.toBeInstanceOf(StoreUnavailableError);
            await expectPriorStateKept();
        });
    });
});
