export class HpPool {
  private value: number;

  constructor(readonly max: number) {
    this.max = Math.max(0, Math.floor(max));
    this.value = this.max;
  }

  get current(): number {
    return this.value;
  }

  get depleted(): boolean {
    return this.value === 0;
  }

  /** Returns the damage actually taken after clamping at 0. */
  damage(amount: number): number {
    const applied = Math.min(this.value, Math.max(0, Math.floor(Number.isFinite(amount) ? amount : 0)));
    this.value -= applied;
    return applied;
  }

  reset(): void {
    this.value = this.max;
  }
}
