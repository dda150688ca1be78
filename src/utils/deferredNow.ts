import type { Clock } from '../types';

const systemClock: Clock = () => new Date();

/**
 * Timestamp provider handed to format functions. The clock is read on the
 * first call to `now()`, so the time is the moment the record is formatted.
 */
export class DeferredNow {
  private captured: Date | null = null;

  constructor(private readonly clock: Clock = systemClock) {}

  now(): Date {
    if (this.captured === null) {
      this.captured = this.clock();
    }
    return this.captured;
  }
}
