/**
 * FIFO of step ids waiting for a worker slot.
 *
 * Steps that become ready in the same transition form one batch and are
 * queued in id order, so dispatch order does not depend on map iteration.
 */
export class ReadyQueue {
  private items: string[] = [];

  enqueueBatch(stepIds: Iterable<string>): void {
    const batch = [...new Set(stepIds)]
      .filter((id) => !this.items.includes(id))
      .sort();
    this.items.push(...batch);
  }

  shift(): string | undefined {
    return this.items.shift();
  }

  remove(stepId: string): boolean {
    const index = this.items.indexOf(stepId);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  /** Empty the queue and return what was in it, in order */
  drain(): string[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): string[] {
    return [...this.items];
  }
}
