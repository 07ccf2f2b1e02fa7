/**
 * Normalize text pulled out of a document before it is handed to the LLM.
 *
 * Drops control characters (keeping tabs and newlines), folds unicode spaces
 * to plain spaces, collapses runs of spaces and blank lines, and trims every line.
 */
export function sanitizeExtractedText(text: string): string {
    const cleaned = text
        .replace(/\r\n?/g, '\n')
        .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g, '')
        .replace(/[\u00a0\u2000-\u200b\u202f\u205f\u3000]/g, ' ')
        .replace(/ +/g, ' ');

    return cleaned
        .split('\n')
        .map((line) => line.trim())
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}
