/**
 * Unit tests for the structured logger
 *
 * Tests RFC 5424 severity levels, message sanitization (log injection prevention),
 * and context sanitization (credential redaction).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { logger, isLogLevel } from '../logger.js';

describe('Logger', () => {
    let consoleErrorSpy: MockInstance<typeof console.error>;

    const output = (call = 0): string => String(consoleErrorSpy.mock.calls[call]?.[0]);

    beforeEach(() => {
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        logger.setLevel('debug');
    });

    afterEach(() => {
        consoleErrorSpy.mockRestore();
        logger.setLevel('info');
    });

    describe('RFC 5424 Severity Levels', () => {
        it('should log at every level the helper uses', () => {
            logger.debug('debug message');
            logger.info('info message');
            logger.warn('warning message');
            logger.error('error message');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(4);
        });

        it('should filter messages below minimum level', () => {
            logger.setLevel('error');

            logger.debug('debug message');
            logger.info('info message');
            logger.warn('warning message');
            logger.error('error message');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
        });

        it('should treat critical as a stricter threshold than error', () => {
            logger.setLevel('critical');

            logger.error('error message');

            expect(consoleErrorSpy).not.toHaveBeenCalled();
        });

        it('should tag warn() lines as WARNING', () => {
            logger.warn('pool nearly exhausted');

            expect(output()).toMatch(/ \[WARNING\] \[HELPER\] pool nearly exhausted$/);
        });

        it('should report the configured level', () => {
            logger.setLevel('notice');
            expect(logger.getLevel()).toBe('notice');
        });

        it('should include level, default module and message in order', () => {
            logger.error('test message');

            expect(output()).toMatch(/^\[[^\]]+\] \[ERROR\] \[HELPER\] test message$/);
        });
    });

    describe('Module Loggers', () => {
        it('should tag lines with the module and code', () => {
            logger.forModule('POOL').info('Connection pool created', { code: 'PG_POOL_CREATED' });

            expect(output()).toMatch(/\[INFO\] \[POOL\] \[PG_POOL_CREATED\] Connection pool created$/);
        });

        it('should append remaining context as JSON', () => {
            logger.forModule('QUERY').debug('Query executed', { operation: 'getSingle', rowCount: 1 });

            expect(output()).toMatch(/\[QUERY\] Query executed \{"operation":"getSingle","rowCount":1\}$/);
        });
    });

    describe('Message Sanitization (Log Injection Prevention)', () => {
        it('should strip null bytes and escape characters', () => {
            logger.info('user input\x00\x1B[2Kwith control chars');

            expect(output()).toMatch(/ user input\[2Kwith control chars$/);
        });

        it('should preserve tabs and newlines', () => {
            logger.info('line1\nline2\ttabbed');

            expect(output()).toContain('line1\nline2\ttabbed');
        });
    });

    describe('Context Sanitization (Credential Redaction)', () => {
        it('should redact password fields', () => {
            logger.info('connecting', { host: 'db.internal', password: 'test-secret' });

            expect(output()).toContain('{"host":"db.internal","password":"[REDACTED]"}');
        });

        it('should redact partial key matches', () => {
            logger.info('test', { apiKey: 'k1', connectionString: 'postgres://u:p@h/d' });

            expect(output()).toContain('{"apiKey":"[REDACTED]","connectionString":"[REDACTED]"}');
        });

        it('should redact nested sensitive fields', () => {
            logger.info('nested config', {
                config: { database: 'mydb', credentials: { user: 'admin' } }
            });

            expect(output()).toContain('{"config":{"database":"mydb","credentials":"[REDACTED]"}}');
        });

        it('should leave null sensitive values alone', () => {
            logger.info('test', { password: null });

            expect(output()).toContain('{"password":null}');
        });
    });

    describe('isLogLevel', () => {
        it('should recognise the eight levels only', () => {
            expect(isLogLevel('warning')).toBe(true);
            expect(isLogLevel('warn')).toBe(false);
        });
    });
});
