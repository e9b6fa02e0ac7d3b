/**
 * Static availability: the same open slots for every date.
 *
 * @module call-actions/scheduling
 */

import type { AvailabilityProvider } from './types.js';

export class StaticAvailabilityProvider implements AvailabilityProvider {
  private times: readonly string[];

  constructor(times: readonly string[]) {
    this.times = times;
  }

  async lookUp(_date: string): Promise<string[]> {
    return [...this.times];
  }
}
