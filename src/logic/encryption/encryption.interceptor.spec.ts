import { BadRequestException, CallHandler } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';
import { testConfigService } from '../../testing/config';
import { EncryptionInterceptor, isEnvelope } from './encryption.interceptor';
import { EncryptionService } from './encryption.service';

describe('EncryptionInterceptor', () => {
    const service = new EncryptionService(testConfigService({ ENCRYPTION_KEY: 'ab'.repeat(32) }));
    const interceptor = new EncryptionInterceptor(service);
    const handler: CallHandler = { handle: () => of({ generation: 'Paris.' }) };

    const contextFor = (request: { method: string; headers: Record<string, string>; body?: unknown }) =>
        new ExecutionContextHost([request, {}, undefined]);

    it('decrypts the body and encrypts the response', async () => {
        const request = {
            method: 'POST',
            headers: { 'x-encrypted': 'true' },
            body: { payload: service.encrypt({ query: 'Capital of France?' }) },
        };

        const response = await lastValueFrom(interceptor.intercept(contextFor(request), handler));

        expect(request.body).toEqual({ query: 'Capital of France?' });
        if (!isEnvelope(response)) throw new Error('response is not an envelope');
        expect(service.decrypt(response.payload)).toEqual({ generation: 'Paris.' });
    });

    it('leaves plain requests alone', async () => {
        const request = { method: 'POST', headers: {}, body: { query: 'hi' } };

        await expect(lastValueFrom(interceptor.intercept(contextFor(request), handler))).resolves.toEqual({ generation: 'Paris.' });
        expect(request.body).toEqual({ query: 'hi' });
    });

    it('rejects an encrypted request without a payload', () => {
        const request = { method: 'POST', headers: { 'x-encrypted': 'true' }, body: { query: 'hi' } };

        expect(() => interceptor.intercept(contextFor(request), handler)).toThrow(BadRequestException);
    });

    it('rejects encrypted requests when no key is configured', () => {
        const plain = new EncryptionInterceptor(new EncryptionService(testConfigService()));
        const request = { method: 'GET', headers: { 'x-encrypted': 'true' } };

        expect(() => plain.intercept(contextFor(request), handler)).toThrow('Encryption is not configured');
    });
});
