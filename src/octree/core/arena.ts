// src/octree/core/arena.ts
import { ArenaFaultError } from "../errors.js";
import type { Handle } from "../interfaces.js";

const GROW = (n: number) => Math.max(2, n << 1);

interface Slot<T> {
  value: T;
}

/** Read-only surface of an arena; no insert, remove or set. */
export type ReadonlyArena<T> = {
  readonly name: string;
  readonly size: number;
  get(handle: Handle): T;
  isAlive(handle: Handle): boolean;
  handles(): Handle[];
};

/**
 * Index-addressed slot storage. Handles stay valid until removed; freed
 * handles are reused most-recently-freed first.
 */
export class Arena<T> {
  readonly name: string;

  private _slots: Array<Slot<T> | undefined> = [];
  private _free: Handle[] = [];
  private _next = 0;
  private _size = 0;

  // per-slot epoch; bumped each time the slot is freed
  private _slotEpoch: Uint32Array;

  constructor(name: string, initialCapacity = 64) {
    this.name = name;
    const cap = Math.max(1, initialCapacity | 0);
    this._slotEpoch = new Uint32Array(cap);
  }

  get capacity() {
    return this._slotEpoch.length | 0;
  }
  get size() {
    return this._size;
  }
  get slotEpoch(): Readonly<Uint32Array> {
    return this._slotEpoch;
  }

  private growToFit(handle: Handle) {
    if (handle < this._slotEpoch.length) return;
    let newCap = this._slotEpoch.length;
    while (newCap <= handle) newCap = GROW(newCap);
    const next = new Uint32Array(newCap);
    next.set(this._slotEpoch);
    this._slotEpoch = next;
  }

  private slotOf(handle: Handle): Slot<T> {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this._next) {
      throw new ArenaFaultError(this.name, handle, "out-of-bounds");
    }
    const slot = this._slots[handle];
    if (slot === undefined) throw new ArenaFaultError(this.name, handle, "stale");
    return slot;
  }

  insert(value: T): Handle {
    const reused = this._free.pop();
    let handle: Handle;
    if (reused !== undefined) {
      handle = reused;
    } else {
      handle = this._next++;
      this.growToFit(handle);
    }
    this._slots[handle] = { value };
    this._size++;
    return handle;
  }

  remove(handle: Handle): T {
    const slot = this.slotOf(handle);
    this._slots[handle] = undefined;
    this._free.push(handle);
    this._size--;
    this._slotEpoch[handle] = (this._slotEpoch[handle] + 1) >>> 0;
    return slot.value;
  }

  get(handle: Handle): T {
    return this.slotOf(handle).value;
  }

  set(handle: Handle, value: T): void {
    this.slotOf(handle).value = value;
  }

  isAlive(handle: Handle): boolean {
    return handle >= 0 && handle < this._next && this._slots[handle] !== undefined;
  }

  /** Live handles in ascending order. */
  handles(): Handle[] {
    const live: Handle[] = [];
    for (let i = 0; i < this._next; i++) {
      if (this._slots[i] !== undefined) live.push(i);
    }
    return live;
  }

  /**
   * Slim read-only view over this arena. `project` maps each value on the way
   * out, e.g. to hand out copies instead of live objects.
   */
  view<U>(project: (value: T) => U): ReadonlyArena<U> {
    const arena: Arena<T> = this;
    return {
      name: this.name,
      get size() { return arena.size; },
      get: (h) => project(arena.get(h)),
      isAlive: (h) => arena.isAlive(h),
      handles: () => arena.handles(),
    };
  }

  /** Deep copy; `copy` clones each stored value (identity by default). */
  clone(copy: (value: T) => T = (v) => v): Arena<T> {
    const out = new Arena<T>(this.name, this.capacity);
    out._slots = this._slots.map((slot) => (slot === undefined ? undefined : { value: copy(slot.value) }));
    out._free = Array.from(this._free);
    out._next = this._next;
    out._size = this._size;
    out._slotEpoch.set(this._slotEpoch);
    return out;
  }
}
