// ─────────────────────────────────────────────
//  Clock: time source for the simulation (seconds)
// ─────────────────────────────────────────────

export interface Clock {
  now(): number;
}

export const SystemClock: Clock = {
  now: () => Date.now() / 1000,
};

/** Clock advanced only by hand; used to replay battles deterministically */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(seconds: number): void {
    this.current = seconds;
  }
}
