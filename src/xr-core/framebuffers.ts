export const DEFAULT_FRAMEBUFFER_ID = 0;

/** Maps host framebuffer objects to stable positive integer names. */
export class FramebufferRegistry {
  private readonly names = new WeakMap<object, number>();
  private nextName = 1;

  nameOf(framebuffer: object | null): number {
    if (framebuffer === null) {
      return DEFAULT_FRAMEBUFFER_ID;
    }

    const existing = this.names.get(framebuffer);
    if (existing !== undefined) {
      return existing;
    }

    const name = this.nextName;
    this.nextName += 1;
    this.names.set(framebuffer, name);
    return name;
  }
}
