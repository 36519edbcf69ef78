/**
 * Single-slot channel: the producer never waits, and a slow consumer only ever
 * sees the newest value. Values published before the previous one was taken
 * are counted in `overwritten`.
 */
export type LatestValueChannel<T> = {
  publish: (value: T) => void;
  take: () => T | undefined;
  close: () => void;
  readonly closed: boolean;
  readonly overwritten: number;
};

export function createLatestValueChannel<T>(): LatestValueChannel<T> {
  let closed = false;
  let overwritten = 0;
  let slot: { value: T } | null = null;

  const publish = (value: T) => {
    if (closed) {
      return;
    }
    if (slot) {
      overwritten += 1;
    }
    slot = { value };
  };

  const take = (): T | undefined => {
    if (!slot) {
      return undefined;
    }
    const { value } = slot;
    slot = null;
    return value;
  };

  const close = () => {
    closed = true;
    slot = null;
  };

  return {
    publish,
    take,
    close,
    get closed() {
      return closed;
    },
    get overwritten() {
      return overwritten;
    },
  };
}
