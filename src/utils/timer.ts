/** Wall-clock step timing in whole milliseconds. */
export class StepTimer {
  private start: bigint = 0n;
  private readonly laps = new Map<string, number>();

  begin(): void {
    this.start = process.hrtime.bigint();
  }

  elapsed(): number {
    const end = process.hrtime.bigint();
    return Number((end - this.start) / 1_000_000n);
  }

  /** Records the time since `begin` under `label` and returns it. */
  lap(label: string): number {
    const ms = this.elapsed();
    this.laps.set(label, ms);
    return ms;
  }

  total(): number {
    let sum = 0;
    for (const ms of this.laps.values()) sum += ms;
    return sum;
  }
}
