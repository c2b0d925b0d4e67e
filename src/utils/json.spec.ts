import { extractJsonObject } from './json';

describe('extractJsonObject', () => {
    it('parses a bare object', () => {
        expect(extractJsonObject('{"choice": "generate"}')).toEqual({ ok: true, value: { choice: 'generate' } });
    });

    it('strips a json code fence', () => {
        expect(extractJsonObject('```json\n{"query": "eiffel tower height"}\n```')).toEqual({
            ok: true,
            value: { query: 'eiffel tower height' },
        });
    });

    it('finds an object embedded in chatter', () => {
        expect(extractJsonObject('Sure! Here it is: {"choice": "web_search"} Hope that helps.')).toEqual({
            ok: true,
            value: { choice: 'web_search' },
        });
    });

    it('returns the raw text when nothing parses', () => {
        expect(extractJsonObject('I think doc_search')).toEqual({ ok: false, raw: 'I think doc_search' });
    });

    it('rejects arrays and primitives', () => {
        expect(extractJsonObject('["doc_search"]')).toEqual({ ok: false, raw: '["doc_search"]' });
        expect(extractJsonObject('42')).toEqual({ ok: false, raw: '42' });
    });
});
