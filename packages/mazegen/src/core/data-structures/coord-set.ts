/**
 * Row-major cell index for (x, y) on a grid of the given width.
 *
 * @example
 * ```typescript
 * cellIndex(5, 10, 100); // 1005
 * ```
 */
export function cellIndex(x: number, y: number, width: number): number {
  return y * width + x;
}

export function cellFromIndex(
  index: number,
  width: number,
): { x: number; y: number } {
  return {
    x: index % width,
    y: Math.floor(index / width),
  };
}

/**
 * Visited-cell set backed by one bit per grid cell.
 *
 * Callers keep coordinates in bounds; out-of-range keys read as absent and
 * writes to them are dropped.
 */
export class CoordSet {
  private readonly bits: Uint32Array;
  private readonly width: number;
  private count = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.bits = new Uint32Array(Math.ceil((width * height) / 32));
  }

  get size(): number {
    return this.count;
  }

  has(x: number, y: number): boolean {
    const key = cellIndex(x, y, this.width);
    const word = this.bits[key >>> 5];
    return word !== undefined && (word & (1 << (key & 31))) !== 0;
  }

  /**
   * Add a cell; returns false when it was already present.
   */
  add(x: number, y: number): boolean {
    const key = cellIndex(x, y, this.width);
    const slot = key >>> 5;
    const bit = 1 << (key & 31);
    const word = this.bits[slot];
    if (word === undefined || (word & bit) !== 0) return false;
    this.bits[slot] = word | bit;
    this.count++;
    return true;
  }

  delete(x: number, y: number): void {
    const key = cellIndex(x, y, this.width);
    const slot = key >>> 5;
    const bit = 1 << (key & 31);
    const word = this.bits[slot];
    if (word === undefined || (word & bit) === 0) return;
    this.bits[slot] = word & ~bit;
    this.count--;
  }

  clear(): void {
    this.bits.fill(0);
    this.count = 0;
  }
}
