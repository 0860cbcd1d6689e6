/**
 * Pull the JSON object embedded in a free-form model reply.
 * Takes the span from the first `{` to the last `}` and parses it.
 */

export type JsonExtraction =
    | { ok: true; value: unknown }
    | { ok: false; reason: 'no_json' | 'invalid_json' };

export function extractJsonBlock(text: string): JsonExtraction {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end === -1 || end < start) {
        return { ok: false, reason: 'no_json' };
    }

    try {
        return { ok: true, value: JSON.parse(text.slice(start, end + 1)) };
    } catch {
        return { ok: false, reason: 'invalid_json' };
    }
}
