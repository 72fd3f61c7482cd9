/**
 * Repeating additive keystream derived from a passphrase.
 *
 * Every byte passed through {@link KeyStream.encrypt} is offset by the next key
 * byte (mod 256); {@link KeyStream.decrypt} subtracts it again. The cursor runs
 * continuously across calls, so both sides of a stream must start at the same
 * position and consume bytes in the same order. There is no integrity check: a
 * wrong passphrase decrypts to garbage rather than failing.
 */
export class KeyStream {
  private cursor = 0;

  private constructor(private readonly key: Uint8Array) {}

  /**
   * Derive a keystream from a passphrase. Each UTF-16 code unit contributes its
   * low byte then its high byte, skipping zero bytes, so plain ASCII yields one
   * key byte per character and an empty passphrase yields an empty key.
   */
  static derive(passphrase: string): KeyStream {
    const bytes: number[] = [];
    for (let i = 0; i < passphrase.length; i += 1) {
      const unit = passphrase.charCodeAt(i);
      const low = unit & 0xff;
      const high = (unit >>> 8) & 0xff;
      if (low !== 0) bytes.push(low);
      if (high !== 0) bytes.push(high);
    }
    return new KeyStream(Uint8Array.from(bytes));
  }

  /** Number of key bytes in one period. */
  get length(): number {
    return this.key.length;
  }

  get position(): number {
    return this.cursor;
  }

  set position(value: number) {
    this.cursor = this.key.length === 0 ? 0 : ((value % this.key.length) + this.key.length) % this.key.length;
  }

  /** Copy of the derived key bytes. */
  keyBytes(): Uint8Array {
    return this.key.slice();
  }

  next(): number {
    if (this.key.length === 0) return 0;
    const value = this.key[this.cursor] ?? 0;
    this.cursor = (this.cursor + 1) % this.key.length;
    return value;
  }

  reset(): void {
    this.cursor = 0;
  }

  /** Offset the first `count` bytes of `data` in place. */
  encrypt(data: Uint8Array, count = data.length): void {
    if (this.key.length === 0) return;
    const limit = Math.min(count, data.length);
    for (let i = 0; i < limit; i += 1) {
      data[i] = ((data[i] ?? 0) + this.next()) & 0xff;
    }
  }

  /** Reverse {@link KeyStream.encrypt} on the first `count` bytes of `data` in place. */
  decrypt(data: Uint8Array, count = data.length): void {
    if (this.key.length === 0) return;
    const limit = Math.min(count, data.length);
    for (let i = 0; i < limit; i += 1) {
      data[i] = ((data[i] ?? 0) - this.next()) & 0xff;
    }
  }
}
