import { describe, expect, it } from 'vitest';
import { FixedWindowLimiter } from '../middleware/rateLimit.js';
import { ipv4ToInt, isWhitelistedIp, normalizeIp } from '../middleware/ipWhitelist.js';

describe('FixedWindowLimiter', () => {
    it('allows max hits per window and reports the wait', () => {
        const limiter = new FixedWindowLimiter(1000, 2);
        expect(limiter.hit('a', 0)).toEqual({ allowed: true });
        expect(limiter.hit('a', 600)).toEqual({ allowed: true });
        expect(limiter.hit('a', 700)).toEqual({ allowed: false, retryAfterSec: 1 });
        expect(limiter.hit('a', 1000)).toEqual({ allowed: true });
    });

    it('drops buckets whose window has passed', () => {
        const limiter = new FixedWindowLimiter(1000, 2);
        limiter.hit('10.0.0.1', 0);
        limiter.hit('10.0.0.2', 500);
        expect(limiter.size).toBe(2);

        limiter.hit('10.0.0.3', 1600);
        expect(limiter.size).toBe(1);
    });

    it('keeps buckets that are still inside their window', () => {
        const limiter = new FixedWindowLimiter(1000, 2);
        limiter.hit('10.0.0.1', 0);
        limiter.hit('10.0.0.2', 900);
        limiter.hit('10.0.0.3', 1200);
        expect(limiter.size).toBe(2);
    });
});

describe('ip whitelist', () => {
    it('parses dotted IPv4 and rejects anything else', () => {
        expect(ipv4ToInt('10.64.0.7')).toBe(10 * 2 ** 24 + 64 * 2 ** 16 + 7);
        expect(ipv4ToInt('255.255.255.255')).toBe(0xffffffff);
        expect(ipv4ToInt('10.64.0.256')).toBeNull();
        expect(ipv4ToInt('fe80::1')).toBeNull();
    });

    it('compares loopback and mapped IPv6 as IPv4', () => {
        expect(normalizeIp('::1')).toBe('127.0.0.1');
        expect(normalizeIp('::ffff:10.64.0.7')).toBe('10.64.0.7');
        expect(isWhitelistedIp('::1', ['127.0.0.1'])).toBe(true);
        expect(isWhitelistedIp('::ffff:10.64.0.7', ['10.64.0.0/24'])).toBe(true);
    });

    it('matches exact addresses and CIDR ranges', () => {
        const list = ['192.168.1.10', '10.64.0.0/24'];
        expect(isWhitelistedIp('192.168.1.10', list)).toBe(true);
        expect(isWhitelistedIp('192.168.1.11', list)).toBe(false);
        expect(isWhitelistedIp('10.64.0.200', list)).toBe(true);
        expect(isWhitelistedIp('10.64.1.1', list)).toBe(false);
    });

    it('handles /0, /32 and malformed prefixes', () => {
        expect(isWhitelistedIp('203.0.113.9', ['0.0.0.0/0'])).toBe(true);
        expect(isWhitelistedIp('203.0.113.9', ['203.0.113.9/32'])).toBe(true);
        expect(isWhitelistedIp('203.0.113.8', ['203.0.113.9/32'])).toBe(false);
        expect(isWhitelistedIp('203.0.113.9', ['203.0.113.0/33'])).toBe(false);
        expect(isWhitelistedIp('203.0.113.9', ['203.0.113.0/abc'])).toBe(false);
        expect(isWhitelistedIp('fe80::2', ['0.0.0.0/0'])).toBe(false);
    });
});
