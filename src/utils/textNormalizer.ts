import path from 'path';

export type Chunk = {
    text: string;
    chunkIndex: number;
};

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md'] as const;

export function normalizeText(s: string): string {
    return s
        .replace(/\r\n/g, '\n')
        .replace(/\t/g, '  ')
        .replace(/[ \u00A0]+/g, ' ')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export function isSupportedFile(fileName: string): boolean {
    const ext = path.extname(fileName).toLowerCase();
    return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

export async function extractTextFromBuffer(fileName: string, buffer: Buffer): Promise<{ text: string; pages?: number }> {
    const ext = path.extname(fileName).toLowerCase();

    if (ext === '.pdf') {
        // Loaded on demand: pdf-parse runs a self-test when it is the entry module.
        const { default: pdf } = await import('pdf-parse');
        const result = await pdf(buffer);
        return { text: normalizeText(result.text || ''), pages: result.numpages };
    }

    if (ext === '.txt' || ext === '.md') {
        return { text: normalizeText(buffer.toString('utf8')) };
    }

    throw new Error(`Unsupported file type: ${ext} (${fileName})`);
}

/**
 * Splits text into overlapping chunks, preferring sentence boundaries.
 * Defaults approximate the 1000-character windows with 200 characters of
 * overlap that the index was tuned for.
 */
export function splitIntoChunks(
    text: string,
    opts: { chunkSize?: number; overlap?: number } = {},
): Chunk[] {
    const chunkSize = opts.chunkSize ?? 1000;
    const overlap = opts.overlap ?? 200;

    if (!text) return [];
    if (text.length <= chunkSize) {
        return [{ text, chunkIndex: 0 }];
    }

    const sentences = text
        .split(/(?<=[.!?])\s+(?=[A-Z("'])/g)
        .filter(Boolean);

    const chunks: Chunk[] = [];
    let current = '';
    const pushChunk = (content: string) => {
        chunks.push({ text: content.trim(), chunkIndex: chunks.length });
    };

    for (const sentence of sentences) {
        // A single sentence longer than the window is cut into hard slices.
        const pieces = sentence.length > chunkSize
            ? sentence.match(new RegExp(`[\\s\\S]{1,${chunkSize}}`, 'g')) ?? [sentence]
            : [sentence];

        for (const piece of pieces) {
            if ((current + ' ' + piece).trim().length <= chunkSize) {
                current = current ? current + ' ' + piece : piece;
            } else {
                if (current) pushChunk(current);
                const tail = current.slice(Math.max(0, current.length - overlap));
                current = tail && (tail + ' ' + piece).length <= chunkSize ? tail + ' ' + piece : piece;
            }
        }
    }

    if (current.trim()) pushChunk(current);

    return chunks;
}
