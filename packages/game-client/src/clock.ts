/** A clock that only moves when told to. Pairs with an executor's injected sleep. */
export class ManualClock {
  private current: number;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  readonly now = (): number => this.current;

  readonly sleep = async (ms: number): Promise<void> => {
    this.current += Math.max(0, ms);
  };

  advance(ms: number): void {
    this.current += Math.max(0, ms);
  }
}
