/**
 * Pixel Buffer - RGBA Raster
 *
 * Two faces of the same storage:
 * - PixelBuffer: published, read-only. Layers, history records and frames all
 *   hold these and may share them freely.
 * - PixelDraft: private, writable scratch space. Rasterizers and the compositor
 *   write into a draft and `publish()` it when done; the draft is dead afterwards.
 *
 * Every edit therefore produces a new buffer and swaps the layer's reference,
 * so an older buffer held by an undo record never changes underneath it.
 */
import type { Color, Size } from "./types";
import { InvalidBufferError, InvariantViolationError } from "./errors";

/**
 * Index-only read access to raw channel bytes (r, g, b, a, r, g, b, a, ...).
 */
export interface ReadonlyBytes {
  readonly [index: number]: number;
  readonly length: number;
}

function checkDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidBufferError(`invalid buffer size ${width}x${height}`);
  }
}

function filled(width: number, height: number, fill?: Color): Uint8ClampedArray {
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill && (fill.r || fill.g || fill.b || fill.a)) {
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill.r;
      data[i + 1] = fill.g;
      data[i + 2] = fill.b;
      data[i + 3] = fill.a;
    }
  }
  return data;
}

export class PixelBuffer {
  readonly width: number;
  readonly height: number;
  private readonly pixels: Uint8ClampedArray;

  private constructor(width: number, height: number, pixels: Uint8ClampedArray) {
    this.width = width;
    this.height = height;
    this.pixels = pixels;
  }

  /**
   * Blank (transparent) or solid buffer
   */
  static create(width: number, height: number, fill?: Color): PixelBuffer {
    checkDimensions(width, height);
    return new PixelBuffer(width, height, filled(width, height, fill));
  }

  /**
   * Copy raw RGBA bytes into a new buffer
   */
  static from(width: number, height: number, bytes: ArrayLike<number>): PixelBuffer {
    checkDimensions(width, height);
    if (bytes.length !== width * height * 4) {
      throw new InvalidBufferError(
        `expected ${width * height * 4} bytes for ${width}x${height}, got ${bytes.length}`,
      );
    }
    return new PixelBuffer(width, height, Uint8ClampedArray.from(bytes));
  }

  /**
   * Start a new writable buffer
   */
  static draft(width: number, height: number, fill?: Color): PixelDraft {
    checkDimensions(width, height);
    return new PixelDraft(width, height, filled(width, height, fill), (w, h, data) => new PixelBuffer(w, h, data));
  }

  get size(): Size {
    return { width: this.width, height: this.height };
  }

  /**
   * Raw channel bytes without copying
   */
  get data(): ReadonlyBytes {
    return this.pixels;
  }

  getPixel(x: number, y: number): Color | null {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    const i = (y * this.width + x) * 4;
    return {
      r: this.pixels[i],
      g: this.pixels[i + 1],
      b: this.pixels[i + 2],
      a: this.pixels[i + 3],
    };
  }

  /**
   * Copy of the raw bytes (safe to hand to encoders)
   */
  bytes(): Uint8ClampedArray {
    return this.pixels.slice();
  }

  clone(): PixelBuffer {
    return new PixelBuffer(this.width, this.height, this.pixels.slice());
  }

  /**
   * Writable copy of this buffer
   */
  toDraft(): PixelDraft {
    return new PixelDraft(this.width, this.height, this.pixels.slice(), (w, h, data) => new PixelBuffer(w, h, data));
  }

  sameSize(other: Size): boolean {
    return this.width === other.width && this.height === other.height;
  }

  equals(other: PixelBuffer): boolean {
    if (other === this) return true;
    if (!this.sameSize(other)) return false;
    const a = this.pixels;
    const b = other.pixels;
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false;
    }
    return true;
  }

  /**
   * True when every pixel is fully transparent
   */
  isBlank(): boolean {
    for (let i = 3; i < this.pixels.length; i += 4) {
      if (this.pixels[i] !== 0) return false;
    }
    return true;
  }

  /**
   * Count of pixels that differ from `other` (sizes must match)
   */
  diffCount(other: PixelBuffer): number {
    if (!this.sameSize(other)) {
      throw new InvariantViolationError("diffCount on buffers of different size");
    }
    let count = 0;
    for (let i = 0; i < this.pixels.length; i += 4) {
      if (
        this.pixels[i] !== other.pixels[i] ||
        this.pixels[i + 1] !== other.pixels[i + 1] ||
        this.pixels[i + 2] !== other.pixels[i + 2] ||
        this.pixels[i + 3] !== other.pixels[i + 3]
      ) {
        count++;
      }
    }
    return count;
  }
}

type Publisher = (width: number, height: number, data: Uint8ClampedArray) => PixelBuffer;

export class PixelDraft {
  readonly width: number;
  readonly height: number;
  private pixels: Uint8ClampedArray | null;
  private readonly publisher: Publisher;

  constructor(width: number, height: number, pixels: Uint8ClampedArray, publisher: Publisher) {
    this.width = width;
    this.height = height;
    this.pixels = pixels;
    this.publisher = publisher;
  }

  /**
   * Writable channel bytes. Throws once the draft has been published.
   */
  get data(): Uint8ClampedArray {
    if (!this.pixels) {
      throw new InvariantViolationError("draft written after publish()");
    }
    return this.pixels;
  }

  get size(): Size {
    return { width: this.width, height: this.height };
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  getPixel(x: number, y: number): Color | null {
    if (!this.contains(x, y)) return null;
    const data = this.data;
    const i = (y * this.width + x) * 4;
    return { r: data[i], g: data[i + 1], b: data[i + 2], a: data[i + 3] };
  }

  setPixel(x: number, y: number, color: Color): void {
    if (!this.contains(x, y)) return;
    const data = this.data;
    const i = (y * this.width + x) * 4;
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
    data[i + 3] = color.a;
  }

  /**
   * Freeze the draft into an immutable buffer. The draft can no longer be used.
   */
  publish(): PixelBuffer {
    const data = this.data;
    this.pixels = null;
    return this.publisher(this.width, this.height, data);
  }
}
