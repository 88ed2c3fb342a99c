import type { NextFunction, Request, Response } from 'express';
import type { ErrorResponse } from '../types.js';

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function ipv4ToInt(ip: string): number | null {
    const m = IPV4.exec(ip);
    if (!m) return null;
    let out = 0;
    for (const octet of m.slice(1)) {
        const n = Number(octet);
        if (n > 255) return null;
        out = out * 256 + n;
    }
    return out;
}

// Loopback and IPv4-mapped IPv6 addresses compare as plain IPv4.
export function normalizeIp(ip: string): string {
    if (ip === '::1') return '127.0.0.1';
    return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

function inCidr(ip: number, entry: string): boolean {
    const [range = '', prefixStr = ''] = entry.split('/');
    const base = ipv4ToInt(range);
    const prefix = Number(prefixStr);
    if (base === null || !/^\d{1,2}$/.test(prefixStr) || prefix > 32) return false;
    if (prefix === 0) return true;
    const mask = (0xffffffff << (32 - prefix)) >>> 0;
    return ((ip & mask) >>> 0) === ((base & mask) >>> 0);
}

/** Entries are exact IPv4 addresses or `a.b.c.d/n` CIDR ranges. */
export function isWhitelistedIp(ip: string, whitelist: string[]): boolean {
    const normalized = normalizeIp(ip);
    const asInt = ipv4ToInt(normalized);
    return whitelist.some((entry) => {
        if (!entry.includes('/')) return entry === normalized;
        return asInt !== null && inCidr(asInt, entry);
    });
}

// An empty list leaves the route open
export function ipWhitelist(whitelist: string[]) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (whitelist.length === 0) return next();
        const clientIp = req.ip || req.socket.remoteAddress || '';
        if (!isWhitelistedIp(clientIp, whitelist)) {
            const body: ErrorResponse = {
                error: { code: 'FORBIDDEN_IP', message: 'Attendance log is restricted to whitelisted addresses' },
            };
            return res.status(403).json(body);
        }
        next();
    };
}
