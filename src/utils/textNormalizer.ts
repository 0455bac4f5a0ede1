export type Chunk = {
    text: string;
    chunkIndex: number;
};

export function normalizeText(s: string): string {
    return s
        .replace(/\r\n/g, "\n")
        .replace(/\t/g, "  ")
        .replace(/[ \u00A0]+/g, " ")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

/**
 * Splits text into overlapping chunks, preferring sentence boundaries.
 * Sentences longer than `chunkSize` are hard-wrapped.
 */
export function splitIntoChunks(
    text: string,
    opts: { chunkSize?: number; overlap?: number } = {}
): Chunk[] {
    const chunkSize = opts.chunkSize ?? 1024;
    const overlap = Math.min(opts.overlap ?? 200, Math.floor(chunkSize / 2));

    const trimmed = text.trim();
    if (!trimmed) {
        return [];
    }
    if (trimmed.length <= chunkSize) {
        return [{ text: trimmed, chunkIndex: 0 }];
    }

    const sentences = trimmed
        .split(/(?<=[.!?])\s+(?=[A-Z(“"'])/g)
        .flatMap(sentence => hardWrap(sentence, chunkSize))
        .filter(Boolean);

    const chunks: string[] = [];
    let current = "";
    for (const sentence of sentences) {
        const candidate = current ? `${current} ${sentence}` : sentence;
        if (candidate.length <= chunkSize) {
            current = candidate;
            continue;
        }
        if (current) {
            chunks.push(current);
        }
        // seed the next chunk with the tail of the previous one
        const tail = current.slice(Math.max(0, current.length - overlap));
        current = tail && tail.length + 1 + sentence.length <= chunkSize ? `${tail} ${sentence}` : sentence;
    }
    if (current.trim()) {
        chunks.push(current);
    }

    return chunks.map((chunk, chunkIndex) => ({ text: chunk.trim(), chunkIndex }));
}

function hardWrap(sentence: string, width: number): string[] {
    if (sentence.length <= width) {
        return [sentence];
    }
    const pieces: string[] = [];
    for (let start = 0; start < sentence.length; start += width) {
        pieces.push(sentence.slice(start, start + width));
    }
    return pieces;
}
