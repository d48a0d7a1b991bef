/**
 * Hand-off slot between the decoder and a polling consumer.
 *
 * @module pixycam-js/publisher
 */

import type { ObjectBlock } from './block.js'

/**
 * Holds at most one completed batch.
 *
 * Completions and polls both run on the event loop, so `publish` and `poll`
 * each replace or take the slot in one synchronous step. A publish replaces
 * any batch the consumer has not taken yet.
 */
export class BatchPublisher {
  private slot: readonly ObjectBlock[] | null = null
  private published: number = 0
  private dropped: number = 0

  /**
   * Replaces the slot with a frame's blocks.
   */
  publish (blocks: readonly ObjectBlock[]): void {
    if (this.slot !== null) {
      this.dropped++
    }
    this.slot = Object.freeze([...blocks])
    this.published++
  }

  /**
   * Takes and clears the slot.
   * @returns The latest batch, or null when nothing new was published
   */
  poll (): readonly ObjectBlock[] | null {
    const batch = this.slot
    this.slot = null
    return batch
  }

  get hasBatch (): boolean {
    return this.slot !== null
  }

  /**
   * Number of batches published so far.
   */
  get publishedCount (): number {
    return this.published
  }

  /**
   * Number of batches replaced before the consumer polled them.
   */
  get droppedCount (): number {
    return this.dropped
  }
}
