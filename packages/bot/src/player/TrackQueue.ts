import type { LoopMode, QueueSnapshot, TrackDescriptor } from '@cadence/shared';
import { InvalidParameterError, InvalidStateError, ResourceBusyError } from '../errors';

// ---------------------------------------------------------------------------
// TrackQueue
//
// Ordered entries plus a cursor (currentIndex) and a loop mode. Unlike a
// plain FIFO, played tracks stay in `entries` until the queue runs off its
// end, which is what makes 'queue' loop mode a matter of wrapping the cursor.
//
// Invariant: currentIndex is a valid index iff entries is non-empty, and null
// otherwise. Every mutation below restores it before returning.
//
// The owning GuildSession serializes every mutation. The preloader only calls upcoming(), which
// returns a copy.
// ---------------------------------------------------------------------------

export interface TrackQueueOptions {
  maxSize?: number;
  /** Uniform [0, 1) source for shuffle(). */
  random?: () => number;
}

export class TrackQueue {
  private entries: TrackDescriptor[] = [];
  private currentIndex: number | null = null;
  private loopMode: LoopMode = 'off';

  private readonly maxSize: number;
  private readonly random: () => number;

  constructor(options: TrackQueueOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.random = options.random ?? Math.random;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  get current(): TrackDescriptor | null {
    return this.currentIndex === null ? null : this.entries[this.currentIndex];
  }

  get length(): number {
    return this.entries.length;
  }

  get mode(): LoopMode {
    return this.loopMode;
  }

  get index(): number | null {
    return this.currentIndex;
  }

  /**
   * The next `count` entries after the current one, in the order they would
   * play. In 'queue' mode this wraps around; the current entry is never
   * included.
   */
  upcoming(count: number): TrackDescriptor[] {
    if (this.currentIndex === null || count <= 0) return [];

    const after = this.entries.slice(this.currentIndex + 1);
    if (this.loopMode === 'queue') {
      after.push(...this.entries.slice(0, this.currentIndex));
    }
    return after.slice(0, count);
  }

  snapshot(): QueueSnapshot {
    return {
      entries: [...this.entries],
      currentIndex: this.currentIndex,
      loopMode: this.loopMode,
    };
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /**
   * Append a track. Returns its index. The first track into an empty queue
   * becomes current.
   */
  enqueue(track: TrackDescriptor): number {
    return this.enqueueMany([track]);
  }

  /**
   * Append several tracks at once; either all fit or none are added.
   * Returns the index of the first one.
   */
  enqueueMany(tracks: readonly TrackDescriptor[]): number {
    if (this.entries.length + tracks.length > this.maxSize) {
      throw new ResourceBusyError(
        `The queue is full (${this.entries.length}/${this.maxSize} tracks).`,
      );
    }

    const firstIndex = this.entries.length;
    this.entries.push(...tracks);
    if (this.currentIndex === null && this.entries.length > 0) {
      this.currentIndex = 0;
    }
    return firstIndex;
  }

  /**
   * Move the cursor after the current track finished, honouring loop mode.
   * Returns the new current track, or null when the queue ran out.
   */
  advance(): TrackDescriptor | null {
    if (this.currentIndex === null) return null;
    if (this.loopMode === 'track') return this.current;
    return this.step();
  }

  /**
   * Like advance(), but always moves on; 'track' loop only repeats a track
   * that ended on its own.
   */
  skip(): TrackDescriptor | null {
    if (this.currentIndex === null) return null;
    return this.step();
  }

  removeAt(index: number): TrackDescriptor {
    this.assertIndex(index);
    if (index === this.currentIndex) {
      throw new InvalidStateError('Cannot remove the track that is playing; skip it instead.');
    }

    const [removed] = this.entries.splice(index, 1);
    if (this.currentIndex !== null && index < this.currentIndex) {
      this.currentIndex--;
    }
    return removed;
  }

  /**
   * Move an entry to a new position. The cursor follows the current track.
   */
  move(from: number, to: number): void {
    this.assertIndex(from);
    this.assertIndex(to);
    if (from === to) return;

    const [track] = this.entries.splice(from, 1);
    this.entries.splice(to, 0, track);

    let index = this.currentIndex;
    if (index === null) return;
    if (index === from) {
      index = to;
    } else {
      if (from < index) index--;
      if (to <= index) index++;
    }
    this.currentIndex = index;
  }

  /**
   * Drop everything except the current track. Returns how many were removed.
   */
  clearUpcoming(): number {
    const current = this.current;
    const removed = this.entries.length - (current ? 1 : 0);
    this.entries = current ? [current] : [];
    this.currentIndex = current ? 0 : null;
    return removed;
  }

  /**
   * Empty the queue entirely.
   */
  clear(): void {
    this.entries = [];
    this.currentIndex = null;
  }

  setLoopMode(mode: LoopMode): void {
    this.loopMode = mode;
  }

  /**
   * Fisher–Yates over every entry except the current one, which keeps its
   * index so playback is not disturbed.
   */
  shuffle(): void {
    const positions = this.entries
      .map((_, i) => i)
      .filter((i) => i !== this.currentIndex);
    const tracks = positions.map((i) => this.entries[i]);

    for (let i = tracks.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [tracks[i], tracks[j]] = [tracks[j], tracks[i]];
    }

    positions.forEach((position, k) => {
      this.entries[position] = tracks[k];
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private step(): TrackDescriptor | null {
    if (this.currentIndex === null) return null;

    const next = this.currentIndex + 1;
    if (next < this.entries.length) {
      this.currentIndex = next;
    } else if (this.loopMode === 'queue') {
      this.currentIndex = 0;
    } else {
      // Ran off the end: the session goes idle with an empty queue.
      this.clear();
    }
    return this.current;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new InvalidParameterError(
        `Queue position ${index} is out of range (0–${this.entries.length - 1}).`,
      );
    }
  }
}
