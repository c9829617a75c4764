/**
 * easy-pg - Error Types Unit Tests
 *
 * Construction, codes, details, inheritance and name properties.
 */

import { describe, it, expect } from 'vitest';
import {
    DataAccessError,
    ConnectionError,
    PoolError,
    QueryError,
    CommitError,
    ValidationError,
    errorMessage,
    sqlStateOf
} from '../errors.js';

describe('DataAccessError', () => {
    it('should create error with message and code', () => {
        const error = new DataAccessError('Test error', 'TEST_CODE');

        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('Test error');
        expect(error.code).toBe('TEST_CODE');
        expect(error.name).toBe('DataAccessError');
        expect(error.details).toBeUndefined();
    });

    it('should keep details and cause', () => {
        const cause = new Error('connection reset');
        const error = new DataAccessError('Wrapped', 'TEST_CODE', { table: 'users' }, { cause });

        expect(error.details).toEqual({ table: 'users' });
        expect(error.cause).toBe(cause);
    });
});

describe('subclasses', () => {
    const cases = [
        { error: new ConnectionError('c'), name: 'ConnectionError', code: 'CONNECTION_ERROR' },
        { error: new PoolError('p'), name: 'PoolError', code: 'POOL_ERROR' },
        { error: new QueryError('q'), name: 'QueryError', code: 'QUERY_ERROR' },
        { error: new CommitError('m'), name: 'CommitError', code: 'COMMIT_FAILED' },
        { error: new ValidationError('v'), name: 'ValidationError', code: 'VALIDATION_ERROR' }
    ];

    it.each(cases)('$name should be a DataAccessError with code $code', ({ error, name, code }) => {
        expect(error).toBeInstanceOf(DataAccessError);
        expect(error.name).toBe(name);
        expect(error.code).toBe(code);
    });

    it('should mark commit failures as ambiguous', () => {
        const error = new CommitError('Commit failed', { sql: 'INSERT' });

        expect(error.details).toEqual({ sql: 'INSERT', ambiguous: true });
    });

    it('should let a known commit outcome clear the ambiguity', () => {
        const error = new CommitError('Commit failed', { sql: 'INSERT', ambiguous: false });

        expect(error.details).toEqual({ sql: 'INSERT', ambiguous: false });
    });

    it('should carry the cause on QueryError', () => {
        const cause = new Error('syntax error');
        const error = new QueryError('Query failed: syntax error', { sql: 'SELCT 1' }, { cause });

        expect(error.cause).toBe(cause);
        expect(error.details?.['sql']).toBe('SELCT 1');
    });
});

describe('errorMessage', () => {
    it('should read Error messages', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('should pass strings through', () => {
        expect(errorMessage('plain failure')).toBe('plain failure');
    });

    it('should fall back for anything else', () => {
        expect(errorMessage(42)).toBe('Unknown error');
    });
});

describe('sqlStateOf', () => {
    it('should read a string code', () => {
        expect(sqlStateOf(Object.assign(new Error('dup'), { code: '23505' }))).toBe('23505');
    });

    it('should ignore missing or non-string codes', () => {
        expect(sqlStateOf(new Error('no code'))).toBeUndefined();
        expect(sqlStateOf({ code: 5 })).toBeUndefined();
        expect(sqlStateOf(null)).toBeUndefined();
    });
});
