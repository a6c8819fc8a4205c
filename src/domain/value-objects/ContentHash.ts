import { createHash } from 'node:crypto';

/** 不可變的 SHA-256 內容雜湊值物件 */
export class ContentHash {
  private constructor(public readonly value: string) {}

  /** 從原始文字計算 SHA-256 */
  static fromText(text: string): ContentHash {
    const hash = createHash('sha256').update(text, 'utf-8').digest('hex');
    return new ContentHash(hash);
  }

  /**
   * 從多段文字計算；每段前綴長度，避免 ["ab","c"] 與 ["a","bc"] 碰撞
   */
  static fromParts(parts: readonly string[]): ContentHash {
    const hash = createHash('sha256');
    for (const part of parts) {
      hash.update(`${part.length}:`, 'utf-8').update(part, 'utf-8');
    }
    return new ContentHash(hash.digest('hex'));
  }

  equals(other: ContentHash): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
