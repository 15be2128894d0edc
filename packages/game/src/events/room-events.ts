import type { DungeonLayout, Room } from "@roomforge/procgen";

/**
 * Payload of each event, keyed by event type.
 */
export interface RoomEventMap {
  readonly "room.entered": { readonly room: Room };
  readonly "room.exited": { readonly room: Room };
  readonly "room.cleared": { readonly room: Room };
  readonly "floor.changed": { readonly floor: number };
  readonly "floor.generated": {
    readonly floor: number;
    readonly layout: DungeonLayout;
  };
  readonly "game.completed": { readonly floors: number };
}

export type RoomEventType = keyof RoomEventMap;

export type RoomEventHandler<T extends RoomEventType> = (
  payload: RoomEventMap[T],
) => void;

type HandlerTable = { [K in RoomEventType]?: Array<RoomEventHandler<K>> };

/**
 * Synchronous, typed event bus for room and floor transitions.
 *
 * Handlers run in subscription order, immediately, inside `emit`. A
 * handler that throws stops the dispatch and the error reaches the caller
 * of `emit`.
 *
 * @example
 * ```typescript
 * const events = new RoomEventBus();
 * const off = events.on("room.cleared", ({ room }) => {
 *   console.log(`cleared [${room.coordinate.row},${room.coordinate.col}]`);
 * });
 * off();
 * ```
 */
export class RoomEventBus {
  private handlers: HandlerTable = {};

  /**
   * @returns Unsubscribe function
   */
  on<T extends RoomEventType>(
    type: T,
    handler: RoomEventHandler<T>,
  ): () => void {
    const list = this.handlers[type];
    if (list) {
      list.push(handler);
    } else {
      this.handlers[type] = [handler];
    }
    return () => this.off(type, handler);
  }

  /**
   * Subscribe for a single dispatch.
   */
  once<T extends RoomEventType>(
    type: T,
    handler: RoomEventHandler<T>,
  ): () => void {
    const off = this.on(type, (payload) => {
      off();
      handler(payload);
    });
    return off;
  }

  off<T extends RoomEventType>(type: T, handler: RoomEventHandler<T>): void {
    const list = this.handlers[type];
    if (!list) return;
    const index = list.indexOf(handler);
    if (index !== -1) list.splice(index, 1);
  }

  emit<T extends RoomEventType>(type: T, payload: RoomEventMap[T]): void {
    const list = this.handlers[type];
    if (!list) return;
    // snapshot: handlers may unsubscribe while we dispatch
    for (const handler of [...list]) {
      handler(payload);
    }
  }

  listenerCount(type: RoomEventType): number {
    return this.handlers[type]?.length ?? 0;
  }

  clear(): void {
    this.handlers = {};
  }
}
