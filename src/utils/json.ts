export type JsonObject = Record<string, unknown>;

export type JsonExtraction =
    | { ok: true; value: JsonObject }
    | { ok: false; raw: string };

const FENCE = /^```(?:json)?\s*|\s*```$/g;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(candidate: string): JsonObject | undefined {
    try {
        const parsed: unknown = JSON.parse(candidate);
        return isJsonObject(parsed) ? parsed : undefined;
    } catch {
        return undefined;
    }
}

/**
 * Pulls the first JSON object out of model output. Models wrap JSON in code
 * fences or chatter often enough that a plain `JSON.parse` is not enough;
 * anything still unparseable comes back as `{ ok: false, raw }`.
 */
export function extractJsonObject(text: string): JsonExtraction {
    const stripped = text.trim().replace(FENCE, '').trim();

    const direct = tryParse(stripped);
    if (direct) return { ok: true, value: direct };

    const start = stripped.indexOf('{');
    const end = stripped.lastIndexOf('}');
    if (start !== -1 && end > start) {
        const embedded = tryParse(stripped.slice(start, end + 1));
        if (embedded) return { ok: true, value: embedded };
    }

    return { ok: false, raw: text };
}
