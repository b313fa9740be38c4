/**
 * Event Bus
 *
 * A typed publish-subscribe channel for decoupling the document model from
 * whatever hosts it. The event map fixes each event's payload type, so
 * `emit` and `on` cannot disagree.
 */
import type { HistoryAction } from "./history-actions";

type Handler<T> = (data: T) => void;

export class EventBus<Events extends object> {
  private handlers = new Map<keyof Events, Set<Handler<never>>>();

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, handler: Handler<Events[K]>): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(event)?.delete(handler);
    };
  }

  /**
   * Emit an event with data
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.handlers.get(event);
    if (!set) return;
    for (const h of set) {
      (h as Handler<Events[K]>)(data);
    }
  }

  /**
   * Remove all handlers for an event
   */
  off<K extends keyof Events>(event: K): void {
    this.handlers.delete(event);
  }

  /**
   * Remove all handlers for all events
   */
  clear(): void {
    this.handlers.clear();
  }
}

/**
 * Events published by a document's layer stack and history
 */
export interface PaintEvents {
  /** Any structural or pixel change to the stack; carries the recorded action */
  "layers:change": HistoryAction;
  /** Cursor moved without an edit */
  "layers:select": { index: number; layerId: string };
  "history:undo": HistoryAction;
  "history:redo": HistoryAction;
  /** Oldest entry dropped to respect the depth limit */
  "history:evict": HistoryAction;
}

export const Events = {
  LAYERS_CHANGE: "layers:change",
  LAYERS_SELECT: "layers:select",
  UNDO: "history:undo",
  REDO: "history:redo",
  HISTORY_EVICT: "history:evict",
} as const satisfies Record<string, keyof PaintEvents>;

export type EventName = (typeof Events)[keyof typeof Events];
