import type { MirrorConnection } from "../cache/predictionMirror";

interface FakeConnectionOptions {
  stored?: string | null;
  /** "hang" leaves connect pending, as node-redis does while it keeps reconnecting. */
  connect?: "ok" | "hang" | Error;
  failWrites?: boolean;
}

export interface FakeMirrorConnection extends MirrorConnection {
  writes: Array<{ key: string; value: string; ttlMs: number }>;
  disconnects: number;
  emitError: (error: Error) => void;
  /** Settles a "hang" connect after the fact. */
  finishConnect: () => void;
}

export const fakeMirrorConnection = (options: FakeConnectionOptions = {}): FakeMirrorConnection => {
  const errorListeners: Array<(error: Error) => void> = [];
  let finishConnect: () => void = () => undefined;
  const outcome = options.connect ?? "ok";

  const connection: FakeMirrorConnection = {
    writes: [],
    disconnects: 0,
    connect: () => {
      if (outcome === "hang") {
        return new Promise<void>((resolve) => {
          finishConnect = resolve;
        });
      }
      return outcome === "ok" ? Promise.resolve() : Promise.reject(outcome);
    },
    disconnect: async () => {
      connection.disconnects += 1;
    },
    get: async () => options.stored ?? null,
    set: async (key, value, ttlMs) => {
      if (options.failWrites) throw new Error("READONLY You can't write against a read only replica.");
      connection.writes.push({ key, value, ttlMs });
    },
    onError: (listener) => {
      errorListeners.push(listener);
    },
    emitError: (error) => errorListeners.forEach((listener) => listener(error)),
    finishConnect: () => finishConnect(),
  };
  return connection;
};
