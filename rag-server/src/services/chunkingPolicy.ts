const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

export type ChunkingOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: string[];
};

/**
 * Recursive character splitter: tries paragraph, line and word boundaries in
 * turn and only hard-cuts when a piece still exceeds the target size.
 */
export class ChunkingPolicy {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor({
    chunkSize = 1000,
    chunkOverlap = 200,
    separators = DEFAULT_SEPARATORS,
  }: ChunkingOptions = {}) {
    if (chunkSize <= 0) {
      throw new Error(`chunkSize must be positive, got ${chunkSize}`);
    }

    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error(
        `chunkOverlap must be in [0, ${chunkSize}), got ${chunkOverlap}`
      );
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
    this.separators = separators;
  }

  split(text: string): string[] {
    if (!text.trim()) {
      return [];
    }

    return this.splitRecursive(text.replace(/\r\n/g, "\n"), this.separators);
  }

  private splitRecursive(text: string, separators: string[]): string[] {
    let separator = separators[separators.length - 1] ?? "";
    let remaining: string[] = [];

    for (let i = 0; i < separators.length; i += 1) {
      const candidate = separators[i];

      if (candidate === "") {
        separator = candidate;
        break;
      }

      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const pieces = (separator ? text.split(separator) : Array.from(text)).filter(
      (piece) => piece !== ""
    );
    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length) {
        chunks.push(...this.merge(pending, separator));
        pending = [];
      }

      if (remaining.length) {
        chunks.push(...this.splitRecursive(piece, remaining));
      } else {
        chunks.push(piece);
      }
    }

    if (pending.length) {
      chunks.push(...this.merge(pending, separator));
    }

    return chunks;
  }

  private merge(pieces: string[], separator: string): string[] {
    const merged: string[] = [];
    const window: string[] = [];
    let total = 0;

    const joinWindow = () => {
      const joined = window.join(separator).trim();

      if (joined) {
        merged.push(joined);
      }
    };

    for (const piece of pieces) {
      const separatorLength = window.length ? separator.length : 0;

      if (total + piece.length + separatorLength > this.chunkSize) {
        if (window.length) {
          joinWindow();

          // drop from the front until only the overlap remains
          while (
            total > this.chunkOverlap ||
            (total > 0 &&
              total +
                piece.length +
                (window.length ? separator.length : 0) >
                this.chunkSize)
          ) {
            const dropped = window.shift();

            if (dropped === undefined) {
              break;
            }

            total -= dropped.length + (window.length ? separator.length : 0);
          }
        }
      }

      window.push(piece);
      total += piece.length + (window.length > 1 ? separator.length : 0);
    }

    joinWindow();

    return merged;
  }
}
