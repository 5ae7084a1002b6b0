export const MAX_MESSAGE_LENGTH = 4000;

export function chunkText(text: string, size: number = MAX_MESSAGE_LENGTH): string[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (text.length <= size) return [text];

  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}
