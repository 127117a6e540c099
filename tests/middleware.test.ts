import { describe, it, expect } from 'vitest';
import mongoose from 'mongoose';
import { checkAdminKey, readAdminKey } from '../middleware/authMiddleware';
import { normalizeError, toErrorResponse } from '../middleware/errorMiddleware';
import { describeIssues } from '../middleware/validate';
import {
    breakingNewsSchema,
    generateNewsletterSchema,
    listNewslettersSchema,
    newsletterByDateSchema,
} from '../utils/validationSchemas';
import AppError from '../utils/AppError';
import { DeliveryError, QuotaExceededError } from '../utils/pipelineErrors';

const SECRET = 'test-secret-test-secret-test-secret';

describe('admin key', () => {
    it('reads the admin header first, then a bearer token', () => {
        expect(readAdminKey('from-header', 'Bearer from-bearer')).toBe('from-header');
        expect(readAdminKey(undefined, 'Bearer from-bearer')).toBe('from-bearer');
        expect(readAdminKey(undefined, 'Basic abc')).toBeUndefined();
        expect(readAdminKey(undefined, undefined)).toBeUndefined();
    });

    it('accepts only the exact secret', () => {
        expect(checkAdminKey(SECRET, SECRET)).toBeNull();
        expect(checkAdminKey(`${SECRET}x`, SECRET)).toMatchObject({ statusCode: 401, errorCode: 'AUTH_INVALID_KEY' });
        expect(checkAdminKey(undefined, SECRET)).toMatchObject({ statusCode: 401 });
    });

    it('closes the admin routes when no secret is configured', () => {
        expect(checkAdminKey(SECRET, undefined)).toMatchObject({ statusCode: 503, errorCode: 'ADMIN_DISABLED' });
    });
});

describe('normalizeError', () => {
    it('turns a cast error into a 400', () => {
        const error = normalizeError(new mongoose.Error.CastError('ObjectId', 'abc', '_id'));
        expect(error).toBeInstanceOf(AppError);
        expect(error).toMatchObject({ statusCode: 400, errorCode: 'INVALID_ID', message: 'Invalid _id: abc' });
    });

    it('lists validation messages', () => {
        const validation = new mongoose.Error.ValidationError();
        validation.addError('title', new mongoose.Error.ValidatorError({ message: 'Title is too long', path: 'title' }));

        expect(normalizeError(validation)).toMatchObject({
            statusCode: 400,
            errorCode: 'VALIDATION_ERROR',
            message: 'Invalid input data. Title is too long',
        });
    });

    it('reports duplicate keys as conflicts', () => {
        const duplicate = { code: 11000, keyValue: { serverId: 'server-1', newsletterDate: '2024-03-09' } };
        expect(normalizeError(duplicate)).toMatchObject({
            statusCode: 409,
            message: 'Duplicate value for serverId, newsletterDate',
        });
    });

    it('leaves other errors alone', () => {
        const error = new Error('plain');
        expect(normalizeError(error)).toBe(error);
    });
});

describe('toErrorResponse', () => {
    it('describes operational errors', () => {
        expect(toErrorResponse(new AppError('No newsletter', 404, 'NEWSLETTER_NOT_FOUND'), false)).toEqual({
            statusCode: 404,
            body: { status: 'fail', message: 'No newsletter', errorCode: 'NEWSLETTER_NOT_FOUND', errorKind: undefined, retryable: undefined },
        });
    });

    it('adds kind and retryability for pipeline errors', () => {
        expect(toErrorResponse(new QuotaExceededError('groq'), false).body).toMatchObject({
            status: 'fail',
            errorCode: 'QUOTA_EXCEEDED',
            errorKind: 'quota_exceeded',
            retryable: true,
        });
        expect(toErrorResponse(new DeliveryError('webhook gone'), false)).toMatchObject({
            statusCode: 502,
            body: { status: 'error', errorKind: 'delivery_failure', retryable: false },
        });
    });

    it('hides unknown errors unless the stack is requested', () => {
        const bug = new TypeError('undefined is not a function');

        expect(toErrorResponse(bug, false)).toEqual({
            statusCode: 500,
            body: { status: 'error', message: 'Internal Server Error', stack: undefined },
        });
        expect(toErrorResponse(bug, true).body.stack).toBe(bug.stack);
    });
});

describe('request schemas', () => {
    it('accepts a plain server id', () => {
        expect(generateNewsletterSchema.safeParse({ params: { serverId: 'server-1' } }).success).toBe(true);
    });

    it('names the offending field', () => {
        const result = generateNewsletterSchema.safeParse({ params: { serverId: 'bad id!' } });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(describeIssues(result.error)).toEqual([{ field: 'params.serverId', message: 'Invalid server id' }]);
        }
    });

    it('defaults a missing breaking-news body and caps the context', () => {
        const parsed = breakingNewsSchema.safeParse({ params: { serverId: 'server-1' } });
        expect(parsed.success && parsed.data.body).toEqual({});

        const tooLong = breakingNewsSchema.safeParse({ params: { serverId: 'server-1' }, body: { channelContext: 'x'.repeat(201) } });
        expect(tooLong.success).toBe(false);
        if (!tooLong.success) expect(describeIssues(tooLong.error)[0].field).toBe('body.channelContext');
    });

    it('coerces the list limit into range', () => {
        const ok = listNewslettersSchema.safeParse({ params: { serverId: 's' }, query: { limit: '20' } });
        expect(ok.success && ok.data.query.limit).toBe(20);

        expect(listNewslettersSchema.safeParse({ params: { serverId: 's' }, query: { limit: '0' } }).success).toBe(false);
        expect(listNewslettersSchema.safeParse({ params: { serverId: 's' }, query: { limit: '500' } }).success).toBe(false);
    });

    it('requires a YYYY-MM-DD date', () => {
        const result = newsletterByDateSchema.safeParse({ params: { serverId: 's', date: '2024-3-9' } });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(describeIssues(result.error)).toEqual([{ field: 'params.date', message: 'Date must be YYYY-MM-DD' }]);
        }
    });
});
