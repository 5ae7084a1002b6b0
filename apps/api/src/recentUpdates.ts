/**
 * Remembers the most recent update ids so a webhook retry of an update that
 * was already handled is acknowledged without being handled again.
 */
export class RecentUpdateIds {
  private readonly ids = new Set<number>();

  constructor(private readonly capacity = 1000) {}

  /** Records `updateId` and reports whether it had been recorded before. */
  seen(updateId: number): boolean {
    if (this.ids.has(updateId)) return true;

    this.ids.add(updateId);
    if (this.ids.size > this.capacity) {
      // Sets iterate in insertion order, so the first entry is the oldest.
      const oldest = this.ids.values().next();
      if (!oldest.done) this.ids.delete(oldest.value);
    }
    return false;
  }
}
