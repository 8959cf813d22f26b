import type { InputSource } from "../contracts/records";
import { handednessCode, targetRayModeCode } from "./codes";
import type { XrInputSourceLike } from "./host";

/**
 * Assigns small integer ids to host input sources. Ids come from the lowest
 * free slot, so an id is reused once its source disconnects.
 */
export class InputSourceRegistry {
  private readonly slots: (XrInputSourceLike | null)[];
  private readonly ids = new Map<XrInputSourceLike, number>();

  constructor(capacity: number) {
    this.slots = new Array<XrInputSourceLike | null>(capacity).fill(null);
  }

  get size(): number {
    return this.ids.size;
  }

  /** Returns the source's id, or -1 when every slot is taken. */
  register(source: XrInputSourceLike): number {
    const existing = this.ids.get(source);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.slots.indexOf(null);
    if (id < 0) {
      return -1;
    }

    this.slots[id] = source;
    this.ids.set(source, id);
    return id;
  }

  release(source: XrInputSourceLike): number {
    const id = this.ids.get(source);
    if (id === undefined) {
      return -1;
    }

    this.slots[id] = null;
    this.ids.delete(source);
    return id;
  }

  idOf(source: XrInputSourceLike): number {
    return this.ids.get(source) ?? -1;
  }

  lookup(id: number): XrInputSourceLike | null {
    if (!Number.isInteger(id) || id < 0 || id >= this.slots.length) {
      return null;
    }
    return this.slots[id];
  }

  describe(source: XrInputSourceLike, out: InputSource): InputSource {
    out.id = this.idOf(source);
    out.handedness = handednessCode(source.handedness);
    out.targetRayMode = targetRayModeCode(source.targetRayMode);
    return out;
  }

  clear(): void {
    this.slots.fill(null);
    this.ids.clear();
  }
}
