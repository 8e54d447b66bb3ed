const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: false });

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** First offset of `needle` in `haystack`, or -1. */
export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array): number {
  const last = haystack.length - needle.length;
  for (let start = haystack.indexOf(needle[0]); start !== -1 && start <= last; ) {
    if (needle.every((byte, i) => haystack[start + i] === byte)) {
      return start;
    }
    start = haystack.indexOf(needle[0], start + 1);
  }
  return -1;
}
