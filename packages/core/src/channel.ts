/**
 * Unbounded single-process queue between independent loops. Producers never
 * wait; consumers suspend in `receive()` until an item arrives or the channel
 * closes, at which point `receive()` resolves to `undefined`.
 */
export class Channel<T> {
  private readonly items: T[] = [];
  private readonly receivers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  public send(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  public receive(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Pending items are still delivered; waiting receivers get `undefined`. */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
  }

  public get size(): number {
    return this.items.length;
  }

  public isClosed(): boolean {
    return this.closed;
  }
}
