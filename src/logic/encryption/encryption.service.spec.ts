import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { testConfigService } from '../../testing/config';
import { EncryptionService } from './encryption.service';

const TEST_KEY = '00'.repeat(32);

describe('EncryptionService', () => {
    const build = async (env: Record<string, string>) => {
        const module: TestingModule = await Test.createTestingModule({
            providers: [EncryptionService, { provide: ConfigService, useValue: testConfigService(env) }],
        }).compile();
        return module.get<EncryptionService>(EncryptionService);
    };

    it('round-trips a JSON body', async () => {
        const service = await build({ ENCRYPTION_KEY: TEST_KEY });
        const body = { query: 'What is the capital of France?', temperature: 0.2, enableInternetSearch: true };

        const payload = service.encrypt(body);

        expect(service.decrypt(payload)).toEqual(body);
        expect(Buffer.from(payload, 'base64').length).toBe(12 + Buffer.byteLength(JSON.stringify(body)) + 16);
    });

    it('uses a fresh nonce per message', async () => {
        const service = await build({ ENCRYPTION_KEY: TEST_KEY });
        expect(service.encrypt({ a: 1 })).not.toBe(service.encrypt({ a: 1 }));
    });

    it('rejects a tampered payload', async () => {
        const service = await build({ ENCRYPTION_KEY: TEST_KEY });
        const bytes = Buffer.from(service.encrypt({ a: 1 }), 'base64');
        bytes[14] ^= 0xff;

        expect(() => service.decrypt(bytes.toString('base64'))).toThrow('Decryption failed. Invalid data or key.');
    });

    it('rejects payloads shorter than nonce and tag', async () => {
        const service = await build({ ENCRYPTION_KEY: TEST_KEY });
        expect(() => service.decrypt(Buffer.alloc(20).toString('base64'))).toThrow('Invalid encrypted data: too short.');
    });

    it('refuses to work without a key', async () => {
        const service = await build({});
        expect(service.enabled).toBe(false);
        expect(() => service.encrypt({})).toThrow(BadRequestException);
    });
});
