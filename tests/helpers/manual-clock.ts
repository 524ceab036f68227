import type { Clock } from "../../src/models";

/** Clock driven by the test */
export class ManualClock {
  constructor(public now: number = Date.parse("2026-01-01T00:00:00.000Z")) {}

  readonly clock: Clock = () => this.now;

  advance(ms: number): number {
    this.now += ms;
    return this.now;
  }
}
