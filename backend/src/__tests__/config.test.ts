import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { parseBoolean, parseDuration } from '../utils/duration';

describe('parseDuration', () => {
    it('should parse unit suffixes into seconds', () => {
        expect(parseDuration('45s', 0)).toBe(45);
        expect(parseDuration('15m', 0)).toBe(900);
        expect(parseDuration('2h', 0)).toBe(7200);
        expect(parseDuration('7d', 0)).toBe(604800);
    });

    it('should treat a bare integer as seconds, including zero and negatives', () => {
        expect(parseDuration('30', 5)).toBe(30);
        expect(parseDuration('0', 5)).toBe(0);
        expect(parseDuration('-60', 5)).toBe(-60);
    });

    it('should fall back for missing or unparseable values', () => {
        expect(parseDuration(undefined, 10)).toBe(10);
        expect(parseDuration('  ', 10)).toBe(10);
        expect(parseDuration('1.5h', 10)).toBe(10);
        expect(parseDuration('soon', 10)).toBe(10);
    });
});

describe('parseBoolean', () => {
    it('should understand common spellings', () => {
        expect(parseBoolean('true', false)).toBe(true);
        expect(parseBoolean('ON', false)).toBe(true);
        expect(parseBoolean('0', true)).toBe(false);
        expect(parseBoolean('no', true)).toBe(false);
    });

    it('should fall back for anything else', () => {
        expect(parseBoolean(undefined, true)).toBe(true);
        expect(parseBoolean('maybe', false)).toBe(false);
    });
});

describe('loadConfig', () => {
    const base = { NODE_ENV: 'test', JWT_SECRET: 'test-secret' };

    it('should apply session defaults', () => {
        const config = loadConfig(base);

        expect(config.accessTokenTtl).toBe(900);
        expect(config.refreshTokenTtl).toBe(604800);
        expect(config.refreshTokenRotation).toBe(true);
        expect(config.refreshTokenReuseWindow).toBe(10);
        expect(config.refreshTokenReusePolicy).toBe('successor');
        expect(config.refreshTokenCleanupInterval).toBe(3600);
        expect(config.dbQueryTimeoutMs).toBe(5000);
        expect(config.jwtIssuer).toBe('opsdesk');
        expect(config.cookieSecure).toBe(false);
    });

    it('should read overrides from the environment', () => {
        const config = loadConfig({
            ...base,
            JWT_ACCESS_TOKEN_TTL: '5m',
            JWT_REFRESH_TOKEN_TTL: '1d',
            JWT_REFRESH_TOKEN_ROTATION: 'false',
            JWT_REFRESH_TOKEN_REUSE_WINDOW: '0',
            JWT_REFRESH_TOKEN_REUSE_POLICY: 'reject',
            DB_QUERY_TIMEOUT: '2s',
        });

        expect(config.accessTokenTtl).toBe(300);
        expect(config.refreshTokenTtl).toBe(86400);
        expect(config.refreshTokenRotation).toBe(false);
        expect(config.refreshTokenReuseWindow).toBe(0);
        expect(config.refreshTokenReusePolicy).toBe('reject');
        expect(config.dbQueryTimeoutMs).toBe(2000);
    });

    it('should default to secure cookies in production', () => {
        expect(loadConfig({ ...base, NODE_ENV: 'production' }).cookieSecure).toBe(true);
    });

    it('should reject invalid settings', () => {
        expect(() => loadConfig({ ...base, JWT_REFRESH_TOKEN_REUSE_POLICY: 'forgive' })).toThrow();
        expect(() => loadConfig({ ...base, JWT_SECRET: 'short' })).toThrow();
        expect(() => loadConfig({ ...base, JWT_REFRESH_TOKEN_REUSE_WINDOW: '-1' })).toThrow();
    });
});
