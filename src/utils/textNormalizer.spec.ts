import { isSupportedFile, normalizeText, splitIntoChunks } from './textNormalizer';

describe('normalizeText', () => {
    it('unifies line endings and collapses runs of blank space', () => {
        expect(normalizeText('a\r\nb\t c\n\n\n\nd  ')).toBe('a\nb c\n\nd');
    });
});

describe('isSupportedFile', () => {
    it('accepts pdf, txt and md regardless of case', () => {
        expect(isSupportedFile('Handbook.PDF')).toBe(true);
        expect(isSupportedFile('notes.md')).toBe(true);
        expect(isSupportedFile('sheet.xlsx')).toBe(false);
    });
});

describe('splitIntoChunks', () => {
    it('returns nothing for empty text and one chunk for short text', () => {
        expect(splitIntoChunks('')).toEqual([]);
        expect(splitIntoChunks('Short note.')).toEqual([
            { text: 'Short note.', chunkIndex: 0 },
        ]);
    });

    it('breaks on sentence boundaries when the window is exceeded', () => {
        const s1 = 'Alpha beta gamma delta epsilon.';
        const s2 = 'Zeta eta theta iota kappa lambda.';
        const s3 = 'Mu nu xi omicron pi rho sigma.';

        const chunks = splitIntoChunks(`${s1} ${s2} ${s3}`, { chunkSize: 40, overlap: 0 });

        expect(chunks.map(chunk => chunk.text)).toEqual([s1, s2, s3]);
        expect(chunks.map(chunk => chunk.chunkIndex)).toEqual([0, 1, 2]);
    });
});
