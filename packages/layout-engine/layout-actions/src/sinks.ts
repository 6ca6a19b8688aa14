/** Destination for serialized text. A throwing `write` aborts the current serialization. */
export type TextSink = {
  write(chunk: string): void;
};

export type StringSink = TextSink & {
  toString(): string;
};

/** Collects everything written into memory. */
export function createStringSink(): StringSink {
  const chunks: string[] = [];
  return {
    write(chunk: string): void {
      chunks.push(chunk);
    },
    toString(): string {
      return chunks.join('');
    },
  };
}
