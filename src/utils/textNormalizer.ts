export type TextWindow = {
    text: string;
    chunk_index: number;
    startChar: number;
    endChar: number;
};

export function normalizeText(s: string): string {
    return s
        .replace(/\r\n/g, "\n")
        .replace(/\t/g, "  ")
        .replace(/[ \u00A0]+/g, " ")
        .replace(/ *\n */g, "\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

const SENTENCE_END = /[.!?](?=\s)/g;

/**
 * Splits text into fixed-size overlapping windows.
 * A window is cut early at the last sentence end (or failing that, the last
 * whitespace) in its second half, so words are not split when avoidable.
 * Consecutive windows overlap by `overlap` characters.
 */
export function splitIntoChunks(
    text: string,
    opts: { chunkSize?: number; overlap?: number } = {}
): TextWindow[] {
    const chunkSize = opts.chunkSize ?? 1000;
    const overlap = opts.overlap ?? 150;
    if (chunkSize <= 0 || overlap < 0 || overlap >= chunkSize) {
        throw new RangeError(`Invalid chunking: size=${chunkSize}, overlap=${overlap}`);
    }

    if (!text.trim()) return [];
    if (text.length <= chunkSize) {
        return [{ text: text.trim(), chunk_index: 0, startChar: 0, endChar: text.length }];
    }

    const windows: TextWindow[] = [];
    const minBreak = Math.floor(chunkSize / 2);
    let start = 0;

    while (start < text.length) {
        let end = Math.min(start + chunkSize, text.length);
        if (end < text.length) {
            end = start + preferredBreak(text.slice(start, end), minBreak);
        }

        const content = text.slice(start, end).trim();
        if (content) {
            windows.push({ text: content, chunk_index: windows.length, startChar: start, endChar: end });
        }
        if (end >= text.length) break;

        const next = end - overlap;
        start = next > start ? next : end;
    }

    return windows;
}

function preferredBreak(window: string, minBreak: number): number {
    let sentenceEnd = -1;
    for (const match of window.matchAll(SENTENCE_END)) {
        if (match.index !== undefined && match.index + 1 >= minBreak) {
            sentenceEnd = match.index + 1;
        }
    }
    if (sentenceEnd > 0) return sentenceEnd;

    const space = Math.max(window.lastIndexOf(" "), window.lastIndexOf("\n"));
    return space >= minBreak ? space : window.length;
}

export function clipText(t: string, maxChars = 15000) {
    if (t.length <= maxChars) return t;
    // keep head and tail; drop middle
    const head = t.slice(0, Math.floor(maxChars * 0.6));
    const tail = t.slice(-Math.floor(maxChars * 0.4));
    return `${head}\n...\n${tail}`;
}
