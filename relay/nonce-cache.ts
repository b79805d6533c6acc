/**
 * Bounded record of nonces this process has broadcast a mint for.
 *
 * It only spares the destination a redundant submission while the first
 * transaction is still pending. The on-chain processedNonces guard remains
 * the authority.
 */
export class RecentNonceCache {
  private readonly nonces = new Set<string>();

  constructor(private readonly maxSize = 10_000) {}

  get size(): number {
    return this.nonces.size;
  }

  has(nonce: bigint): boolean {
    return this.nonces.has(nonce.toString());
  }

  add(nonce: bigint): void {
    this.nonces.add(nonce.toString());
    if (this.nonces.size > this.maxSize) {
      this.evictOldest();
    }
  }

  /** Drop the oldest 10% (Set iterates in insertion order). */
  private evictOldest(): void {
    const toEvict = Math.max(1, Math.floor(this.maxSize * 0.1));
    let evicted = 0;
    for (const nonce of this.nonces) {
      if (evicted >= toEvict) break;
      this.nonces.delete(nonce);
      evicted++;
    }
  }
}
