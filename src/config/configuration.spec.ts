import { validateConfig } from './configuration';

describe('validateConfig', () => {
    it('fills defaults for an empty environment', () => {
        const config = validateConfig({});

        expect(config.PORT).toBe(8787);
        expect(config.ENABLE_INTERNET_SEARCH).toBe(false);
        expect(config.MAX_MESSAGES_PER_USER).toBe(500);
        expect(config.WEB_SEARCH_MIN_INTERVAL_MS).toBe(1000);
        expect(config.DB_TYPE).toBe('better-sqlite3');
        expect(config.APPROVED_USER_IDS).toEqual([]);
        expect(config.JWT_EXPIRY_HOURS).toBeUndefined();
        expect(config.ENCRYPTION_KEY).toBeUndefined();
    });

    it('parses lists, flags and numbers from strings', () => {
        const config = validateConfig({
            APPROVED_USER_IDS: ' alice, bob ,,carol',
            ENABLE_INTERNET_SEARCH: 'TRUE',
            MAX_MESSAGES_PER_USER: '20',
            JWT_EXPIRY_HOURS: '',
        });

        expect(config.APPROVED_USER_IDS).toEqual(['alice', 'bob', 'carol']);
        expect(config.ENABLE_INTERNET_SEARCH).toBe(true);
        expect(config.MAX_MESSAGES_PER_USER).toBe(20);
        expect(config.JWT_EXPIRY_HOURS).toBeUndefined();
    });

    it('names the offending key', () => {
        expect(() => validateConfig({ ENCRYPTION_KEY: 'abc' })).toThrow(
            'Invalid configuration: ENCRYPTION_KEY: must be 64 hex characters (32 bytes)',
        );
    });

    it('rejects delays longer than a timer can hold', () => {
        expect(validateConfig({ REQUEST_TIMEOUT_MS: '2147483647' }).REQUEST_TIMEOUT_MS).toBe(2_147_483_647);
        expect(() => validateConfig({ REQUEST_TIMEOUT_MS: '3000000000' })).toThrow(/REQUEST_TIMEOUT_MS/);
        expect(() => validateConfig({ WEB_SEARCH_MIN_INTERVAL_MS: '3000000000' })).toThrow(/WEB_SEARCH_MIN_INTERVAL_MS/);
    });

    it('rejects a retrieval depth outside 1..10', () => {
        expect(() => validateConfig({ RETRIEVAL_TOP_K: '25' })).toThrow(/RETRIEVAL_TOP_K/);
    });
});
