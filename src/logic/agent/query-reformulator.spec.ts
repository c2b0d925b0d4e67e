import { ScriptedCompletion } from '../../testing/fakes';
import { CONTEXTUALIZE_SYSTEM } from './prompts';
import { QueryReformulator } from './query-reformulator';

describe('QueryReformulator', () => {
    const history = [
        { role: 'user' as const, content: 'Who wrote the leave policy?' },
        { role: 'assistant' as const, content: 'The HR team.' },
    ];

    it('returns the question untouched when there is no history', async () => {
        const completion = new ScriptedCompletion({ standalone: 'should not be used' });
        const reformulator = new QueryReformulator(completion, 'test-model');

        await expect(reformulator.standalone('When was it updated?', [])).resolves.toBe('When was it updated?');
        expect(completion.requests).toHaveLength(0);
    });

    it('rewrites follow-ups against the history', async () => {
        const completion = new ScriptedCompletion({ standalone: '  When was the leave policy updated?\n' });
        const reformulator = new QueryReformulator(completion, 'test-model');

        await expect(reformulator.standalone('When was it updated?', history)).resolves.toBe('When was the leave policy updated?');
        expect(completion.requests[0]).toEqual({
            model: 'test-model',
            temperature: 0,
            system: CONTEXTUALIZE_SYSTEM,
            history,
            prompt: 'When was it updated?',
        });
    });

    it('keeps the question when the rewrite is blank', async () => {
        const reformulator = new QueryReformulator(new ScriptedCompletion({ standalone: '   ' }), 'test-model');
        await expect(reformulator.standalone('When was it updated?', history)).resolves.toBe('When was it updated?');
    });

    it('reads the web query from JSON', async () => {
        const reformulator = new QueryReformulator(new ScriptedCompletion({ webQuery: '{"query": " france capital "}' }), 'test-model');
        await expect(reformulator.forWebSearch('What is the capital of France?')).resolves.toBe('france capital');
    });

    it.each([['garbage'], ['{"query": ""}'], ['{"q": "france"}']])('falls back to the question for %s', async raw => {
        const reformulator = new QueryReformulator(new ScriptedCompletion({ webQuery: raw }), 'test-model');
        await expect(reformulator.forWebSearch('What is the capital of France?')).resolves.toBe('What is the capital of France?');
    });
});
