export class CancellationToken {
  private cancelled = false;
  private readonly listeners = new Set<() => void>();

  get isCancelled() {
    return this.cancelled;
  }

  cancel() {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  onCancel(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
