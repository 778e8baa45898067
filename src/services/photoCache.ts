import type { PhotoRecord } from '../types/photo';

/**
 * Bounded FIFO of prefetched photos.
 *
 * The filler appends at the tail, the scheduler takes from the head. Every
 * operation is synchronous, so producer and consumer never interleave inside one.
 */
export class PhotoCache {
  private readonly records: PhotoRecord[] = [];

  constructor(readonly capacity: number = 15) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.records.length;
  }

  get isFull(): boolean {
    return this.records.length >= this.capacity;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  /**
   * Add a record at the tail. Returns false (and drops it) when full.
   */
  append(record: PhotoRecord): boolean {
    if (this.isFull) return false;
    this.records.push(record);
    return true;
  }

  /**
   * Remove and return the oldest record, or undefined when empty. Never waits.
   */
  tryTake(): PhotoRecord | undefined {
    return this.records.shift();
  }
}
