// Typed views over an instance's linear memory.
//
// A view is stale when its cached byte length differs from the current
// buffer's byte length. That is the only check: a growable shared buffer keeps
// its identity across growth, and the growing thread may be one we never
// hear from, so identity and notifications tell us nothing.

export interface ViewMap {
  u8: Uint8Array;
  i8: Int8Array;
  u16: Uint16Array;
  i16: Int16Array;
  u32: Uint32Array;
  i32: Int32Array;
  f32: Float32Array;
  f64: Float64Array;
  i64: BigInt64Array;
  u64: BigUint64Array;
  data: DataView;
}

export type ViewKind = keyof ViewMap;

/** Anything with a (possibly shared) backing buffer, e.g. `WebAssembly.Memory`. */
export interface MemoryLike {
  readonly buffer: ArrayBufferLike;
}

/** One cached view, rebuilt whenever the buffer's byte length moves. */
class CachedView<V extends ArrayBufferView> {
  private view: V | undefined;
  private byteLength = -1;

  constructor(private readonly build: (buffer: ArrayBufferLike) => V) {}

  current(buffer: ArrayBufferLike, onRebuild: () => void): V {
    let view = this.view;
    if (view === undefined || this.byteLength !== buffer.byteLength) {
      view = this.build(buffer);
      this.view = view;
      this.byteLength = buffer.byteLength;
      onRebuild();
    }
    return view;
  }
}

type ViewEntries = { [K in ViewKind]: CachedView<ViewMap[K]> };

function createEntries(): ViewEntries {
  return {
    u8: new CachedView((buffer) => new Uint8Array(buffer)),
    i8: new CachedView((buffer) => new Int8Array(buffer)),
    u16: new CachedView((buffer) => new Uint16Array(buffer)),
    i16: new CachedView((buffer) => new Int16Array(buffer)),
    u32: new CachedView((buffer) => new Uint32Array(buffer)),
    i32: new CachedView((buffer) => new Int32Array(buffer)),
    f32: new CachedView((buffer) => new Float32Array(buffer)),
    f64: new CachedView((buffer) => new Float64Array(buffer)),
    i64: new CachedView((buffer) => new BigInt64Array(buffer)),
    u64: new CachedView((buffer) => new BigUint64Array(buffer)),
    data: new CachedView((buffer) => new DataView(buffer)),
  };
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: false });
const utf8Encoder = new TextEncoder();

export class MemoryViewCache {
  private readonly entries: ViewEntries = createEntries();
  private rebuildCount = 0;

  constructor(readonly memory: MemoryLike) {}

  /** Number of times a view was (re)built. */
  get rebuilds(): number {
    return this.rebuildCount;
  }

  view<K extends ViewKind>(kind: K): ViewMap[K] {
    const entry: CachedView<ViewMap[K]> = this.entries[kind];
    return entry.current(this.memory.buffer, () => {
      this.rebuildCount++;
    });
  }

  get byteLength(): number {
    return this.memory.buffer.byteLength;
  }

  readString(ptr: number, len: number): string {
    this.checkBounds(ptr, len);
    const bytes = this.view("u8").subarray(ptr, ptr + len);
    // TextDecoder refuses views over shared memory in browsers.
    return utf8Decoder.decode(isShared(bytes.buffer) ? bytes.slice() : bytes);
  }

  /** Writes UTF-8 bytes at `ptr`, returning the number of bytes written. */
  writeString(ptr: number, value: string): number {
    const encoded = utf8Encoder.encode(value);
    this.checkBounds(ptr, encoded.length);
    this.view("u8").set(encoded, ptr);
    return encoded.length;
  }

  private checkBounds(ptr: number, len: number): void {
    if (ptr < 0 || len < 0 || ptr + len > this.byteLength) {
      throw new RangeError(
        `memory access out of bounds: [${ptr}, ${ptr + len}) exceeds ${this.byteLength} bytes`,
      );
    }
  }
}

export function isShared(buffer: ArrayBufferLike): boolean {
  return typeof SharedArrayBuffer !== "undefined" && buffer instanceof SharedArrayBuffer;
}
