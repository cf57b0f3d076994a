export type CodeUnitArray = Uint8Array | Uint16Array;

/** Growth stops here; writes past it are dropped. */
export const MAX_CANON_OUTPUT_CAPACITY = 1 << 30;

const DEFAULT_FIXED_CAPACITY = 1024;
const MIN_GROWN_CAPACITY = 16;

/**
 * Append-only character buffer behind every canonicalizer.
 *
 * Appending, truncating and indexed access live here and are not meant to be
 * overridden. Subclasses own the storage and supply `resize`, which is only
 * reached when the current capacity runs out.
 */
export abstract class CanonOutputT<A extends CodeUnitArray> {
  protected buffer: A;
  protected currentLength = 0;
  protected readonly maxCapacity: number = MAX_CANON_OUTPUT_CAPACITY;

  protected constructor(initial: A) {
    this.buffer = initial;
  }

  /**
   * Replaces the storage with one of exactly `size` elements, keeping the first
   * `length` elements. `size` is always larger than the current capacity.
   */
  protected abstract resize(size: number): void;

  abstract data(): A;

  abstract toString(): string;

  get length(): number {
    return this.currentLength;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  /** The whole storage, for bulk writes past `length` followed by `setLength`. */
  raw(): A {
    return this.buffer;
  }

  at(offset: number): number {
    return this.storage()[offset] ?? 0;
  }

  set(offset: number, unit: number): void {
    if (offset < this.currentLength) {
      this.storage()[offset] = unit;
    }
  }

  /** Truncates (or, after a bulk write, extends) the logical length; clamped to `[0, capacity]`. */
  setLength(length: number): void {
    this.currentLength = Math.max(0, Math.min(length, this.capacity));
  }

  reserve(capacity: number): boolean {
    if (capacity <= this.capacity) {
      return true;
    }
    return this.grow(capacity - this.capacity);
  }

  pushBack(unit: number): void {
    if (this.currentLength < this.buffer.length) {
      this.storage()[this.currentLength] = unit;
      this.currentLength += 1;
      return;
    }

    if (!this.grow(1)) {
      return;
    }

    this.storage()[this.currentLength] = unit;
    this.currentLength += 1;
  }

  append(units: ArrayLike<number>, begin = 0, end = units.length): void {
    const count = end - begin;
    if (count <= 0) {
      return;
    }

    if (this.currentLength + count > this.buffer.length) {
      if (!this.grow(this.currentLength + count - this.buffer.length)) {
        return;
      }
    }

    const storage = this.storage();
    for (let i = 0; i < count; i += 1) {
      storage[this.currentLength + i] = units[begin + i] ?? 0;
    }
    this.currentLength += count;
  }

  /** Appends text made of code units below 0x100 (delimiters, digits, canonical host text). */
  appendAscii(text: string): void {
    for (let i = 0; i < text.length; i += 1) {
      this.pushBack(text.charCodeAt(i));
    }
  }

  substring(begin: number, end: number = this.currentLength): string {
    let text = '';
    const stop = Math.min(end, this.currentLength);
    for (let i = begin; i < stop; i += 1) {
      text += String.fromCharCode(this.storage()[i] ?? 0);
    }
    return text;
  }

  private storage(): CodeUnitArray {
    return this.buffer;
  }

  protected grow(minAdditional: number): boolean {
    let newCapacity = this.buffer.length;
    do {
      if (newCapacity >= this.maxCapacity) {
        return false;
      }
      newCapacity = newCapacity === 0 ? MIN_GROWN_CAPACITY : newCapacity * 2;
    } while (newCapacity < this.buffer.length + minAdditional);

    this.resize(Math.min(newCapacity, this.maxCapacity));
    return true;
  }
}

/**
 * Buffer that starts in a fixed region sized for typical URLs and moves to owned
 * storage the first time it overflows. A fixed capacity of 0 means owned storage
 * from the first write.
 */
export abstract class RawCanonOutputT<A extends CodeUnitArray> extends CanonOutputT<A> {
  private readonly fixedBuffer: A;

  protected constructor(fixedBuffer: A) {
    super(fixedBuffer);
    this.fixedBuffer = fixedBuffer;
  }

  protected abstract allocate(size: number): A;

  get usesFixedBuffer(): boolean {
    return this.buffer === this.fixedBuffer;
  }

  protected resize(size: number): void {
    const next = this.allocate(size);
    next.set(this.buffer.subarray(0, Math.min(this.currentLength, size)));
    this.buffer = next;
  }
}

const utf8Decoder = new TextDecoder('utf-8');

/** Narrow output; canonical URLs are ASCII apart from a UTF-8 fragment. */
export class RawCanonOutput extends RawCanonOutputT<Uint8Array> {
  constructor(fixedCapacity: number = DEFAULT_FIXED_CAPACITY) {
    super(new Uint8Array(fixedCapacity));
  }

  protected allocate(size: number): Uint8Array {
    return new Uint8Array(size);
  }

  data(): Uint8Array {
    return this.buffer.subarray(0, this.currentLength);
  }

  toString(): string {
    return utf8Decoder.decode(this.data());
  }
}

export class RawCanonOutputW extends RawCanonOutputT<Uint16Array> {
  constructor(fixedCapacity: number = DEFAULT_FIXED_CAPACITY) {
    super(new Uint16Array(fixedCapacity));
  }

  protected allocate(size: number): Uint16Array {
    return new Uint16Array(size);
  }

  data(): Uint16Array {
    return this.buffer.subarray(0, this.currentLength);
  }

  toString(): string {
    let text = '';
    for (const unit of this.data()) {
      text += String.fromCharCode(unit);
    }
    return text;
  }
}

export type CanonOutput = CanonOutputT<Uint8Array>;
export type CanonOutputW = CanonOutputT<Uint16Array>;
