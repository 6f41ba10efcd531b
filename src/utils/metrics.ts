/**
 * Process-wide hit counter. Every read and write goes through `Atomics` on a
 * shared Int32 cell.
 */
export class RequestCounter {
  private readonly cell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  /** Returns the value after the increment. */
  increment(): number {
    return Atomics.add(this.cell, 0, 1) + 1;
  }

  load(): number {
    return Atomics.load(this.cell, 0);
  }

  store(value: number): void {
    Atomics.store(this.cell, 0, value);
  }
}
