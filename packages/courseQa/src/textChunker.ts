// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * A contiguous piece of source text. Trailing whitespace is kept with the piece,
 * so the pieces of a text concatenate back to that text
 */
export type TextSegment = {
    value: string;
    type: "sentence" | "word" | "fragment";
};

/**
 * A window of consecutive segments
 */
export type TextChunk = {
    /**
     * The window's text, untrimmed
     */
    body: string;
    /**
     * Number of leading characters of body repeated from the previous chunk
     */
    overlap: number;
};

export function splitIntoLines(text: string): string[] {
    return text.split(/\r?\n/);
}

/**
 * Split text into sentences, keeping the whitespace that follows each sentence
 * @param text
 * @returns
 */
export function splitIntoSentences(text: string): TextSegment[] {
    return splitKeepingSeparators(text, /(?<=[.!?;\r\n])\s+/g, "sentence");
}

export function splitIntoWords(text: string): TextSegment[] {
    return splitKeepingSeparators(text, /\s+/g, "word");
}

function splitKeepingSeparators(
    text: string,
    separator: RegExp,
    type: TextSegment["type"],
): TextSegment[] {
    const segments: TextSegment[] = [];
    let start = 0;
    for (const match of text.matchAll(separator)) {
        const end = (match.index ?? 0) + match[0].length;
        if (end > start) {
            segments.push({ value: text.slice(start, end), type });
        }
        start = end;
    }
    if (start < text.length) {
        segments.push({ value: text.slice(start), type });
    }
    return segments;
}

/**
 * Progressively splits segments that are too large to fit in a chunk
 * Sentence --> Words --> fixed size fragments
 * @param segment
 * @param maxChars
 * @returns
 */
export function splitSegment(
    segment: TextSegment,
    maxChars: number,
): TextSegment[] {
    if (segment.value.length <= maxChars) {
        return [segment];
    }
    if (segment.type === "sentence") {
        const words = splitIntoWords(segment.value);
        if (words.length > 1) {
            return words.flatMap((w) => splitSegment(w, maxChars));
        }
    }
    const fragments: TextSegment[] = [];
    for (let i = 0; i < segment.value.length; i += maxChars) {
        fragments.push({
            value: segment.value.slice(i, i + maxChars),
            type: "fragment",
        });
    }
    return fragments;
}

/**
 * Join text into chunks of about maxCharsPerChunk characters, breaking at sentence boundaries
 * when possible. Each chunk after the first starts with the whole sentences (up to
 * overlapChars characters) that ended the previous chunk.
 * @param text
 * @param maxCharsPerChunk
 * @param overlapChars
 */
export function* splitTextIntoChunks(
    text: string,
    maxCharsPerChunk: number,
    overlapChars: number,
): IterableIterator<TextChunk> {
    if (!isValidChunkSize(maxCharsPerChunk)) {
        throw new Error(`Invalid chunk size ${maxCharsPerChunk}`);
    }
    const segments = splitIntoSentences(text).flatMap((s) =>
        splitSegment(s, maxCharsPerChunk),
    );
    let start = 0;
    // First segment not already emitted by a previous chunk
    let firstNew = 0;
    while (start < segments.length) {
        let end = start;
        let length = 0;
        while (
            end < segments.length &&
            (end <= firstNew ||
                length + segments[end].value.length <= maxCharsPerChunk)
        ) {
            length += segments[end].value.length;
            ++end;
        }
        const overlapLength = segmentsLength(segments, start, firstNew);
        yield {
            body: joinSegments(segments, start, end),
            overlap: overlapLength,
        };
        if (end >= segments.length) {
            break;
        }
        // Walk back from the end, collecting whole segments for the overlap.
        // Never take the entire chunk, so that every chunk adds new text
        let nextStart = end;
        let carried = 0;
        while (
            nextStart - 1 > start &&
            carried + segments[nextStart - 1].value.length <= overlapChars
        ) {
            --nextStart;
            carried += segments[nextStart].value.length;
        }
        firstNew = end;
        start = nextStart;
    }
}

export function isValidChunkSize(maxCharsPerChunk: number): boolean {
    return (
        Number.isInteger(maxCharsPerChunk) &&
        maxCharsPerChunk > 0 &&
        maxCharsPerChunk < Number.MAX_SAFE_INTEGER
    );
}

function joinSegments(
    segments: TextSegment[],
    start: number,
    end: number,
): string {
    let text = "";
    for (let i = start; i < end; ++i) {
        text += segments[i].value;
    }
    return text;
}

function segmentsLength(
    segments: TextSegment[],
    start: number,
    end: number,
): number {
    let length = 0;
    for (let i = start; i < end; ++i) {
        length += segments[i].value.length;
    }
    return length;
}
