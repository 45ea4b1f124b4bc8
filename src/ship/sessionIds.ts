export const MAX_SESSION_ID = 0xffffffff;

export type SessionIdAllocatorOptions = {
  first?: number;
  max?: number;
};

/**
 * Hands out session ids in increasing order, wrapping back to 1 after `max`. Id 0 belongs to
 * the Link itself and is never returned; ids still in use are skipped.
 */
export class SessionIdAllocator {
  private readonly max: number;
  private next: number;

  constructor(opts: SessionIdAllocatorOptions = {}) {
    this.max = opts.max ?? MAX_SESSION_ID;
    const first = opts.first ?? 1;
    if (!Number.isInteger(first) || first < 1 || first > this.max) {
      throw new RangeError(`first session id must be in 1..${this.max}`);
    }
    this.next = first;
  }

  allocate(inUse: (id: number) => boolean): number {
    for (let i = 0; i < this.max; i += 1) {
      const id = this.next;
      this.next = id >= this.max ? 1 : id + 1;
      if (!inUse(id)) return id;
    }
    throw new Error("no free session id");
  }
}
