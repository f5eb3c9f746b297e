export class AlertCooldown {
  private readonly lastTriggered = new Map<string, number>();

  constructor(
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  static key(streamId: string, rule: string) {
    return `${streamId}\u0000${rule}`;
  }

  shouldSuppress(key: string): boolean {
    const now = this.now();
    const last = this.lastTriggered.get(key);
    if (last !== undefined && now - last < this.windowMs) {
      return true;
    }
    this.lastTriggered.set(key, now);
    return false;
  }

  clear() {
    this.lastTriggered.clear();
  }
}
