/**
 * A single-slot delayed callback. Scheduling replaces whatever was pending,
 * so at most one callback can ever fire per timer.
 */
export class CancellableTimer {
  private handle: ReturnType<typeof setTimeout> | null = null;

  get pending(): boolean {
    return this.handle !== null;
  }

  schedule(delayMs: number, callback: () => void): void {
    this.cancel();
    this.handle = setTimeout(() => {
      this.handle = null;
      callback();
    }, delayMs);
  }

  cancel(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}
