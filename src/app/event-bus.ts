import type { FacadeEventMap } from "../contracts/events";
import type { FacadeEventBus } from "../contracts/integration";

type Handler<TPayload> = (payload: TPayload) => void;

const REPLAYABLE_EVENTS: ReadonlySet<keyof FacadeEventMap> = new Set<keyof FacadeEventMap>([
  "xr/state"
]);

export function createFacadeEventBus(): FacadeEventBus {
  const handlers = new Map<keyof FacadeEventMap, Set<Handler<unknown>>>();
  const retainedPayloads = new Map<keyof FacadeEventMap, unknown>();

  const emit = <TEventName extends keyof FacadeEventMap>(
    eventName: TEventName,
    payload: FacadeEventMap[TEventName]
  ): void => {
    if (REPLAYABLE_EVENTS.has(eventName)) {
      retainedPayloads.set(eventName, payload);
    }

    const scopedHandlers = handlers.get(eventName);
    if (!scopedHandlers) {
      return;
    }

    // Copy so handlers may unsubscribe while the event is delivered.
    for (const handler of [...scopedHandlers]) {
      handler(payload);
    }
  };

  const on = <TEventName extends keyof FacadeEventMap>(
    eventName: TEventName,
    handler: (payload: FacadeEventMap[TEventName]) => void
  ): (() => void) => {
    const stored = handler as Handler<unknown>;
    const scopedHandlers = handlers.get(eventName) ?? new Set<Handler<unknown>>();
    scopedHandlers.add(stored);
    handlers.set(eventName, scopedHandlers);

    if (retainedPayloads.has(eventName)) {
      handler(retainedPayloads.get(eventName) as FacadeEventMap[TEventName]);
    }

    return () => {
      const current = handlers.get(eventName);
      if (!current) {
        return;
      }

      current.delete(stored);
      if (current.size === 0) {
        handlers.delete(eventName);
      }
    };
  };

  return {
    emit,
    on
  };
}
