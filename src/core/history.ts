/**
 * History Manager - Undo/Redo System
 *
 * Keeps two bounded stacks of action records. Recording a new action drops
 * the redo stack (no branching history). Undo reverts the newest action
 * against its target and moves the same record onto the redo stack; redo
 * replays it forward and moves it back.
 *
 * The undo stack holds at most `maxSize` entries. Past that the oldest entry
 * is evicted and can no longer be reverted.
 *
 * `BoundedHistory` holds the stack discipline; subclasses say how an action
 * is reverted and replayed. `HistoryManager` does it for a layer stack.
 */
import { Store } from "./stores";
import type { EventBus, PaintEvents } from "./event-bus";
import { type HistoryAction, type RestorableStack, reapplyAction, revertAction } from "./history-actions";
import { config } from "./config";
import { scopedLogger } from "./logger";

const log = scopedLogger("history");

/**
 * Observable state for hosts to subscribe to
 */
export interface HistoryState {
  canUndo: boolean;
  canRedo: boolean;
}

export interface HistoryEntry {
  /** Human-readable name for history listings */
  label: string;
}

export type HistoryNotice = "undo" | "redo" | "evict";

export interface HistoryOptions {
  /** Undo depth; defaults to PAINT_HISTORY_LIMIT */
  maxSize?: number;
  /** Bus that receives undo/redo/evict notifications */
  events?: EventBus<PaintEvents>;
}

export abstract class BoundedHistory<A extends HistoryEntry, T> {
  private undoStack: A[] = [];
  private redoStack: A[] = [];
  private isRestoring = false;

  readonly maxSize: number;
  readonly state = new Store<HistoryState>({ canUndo: false, canRedo: false });

  constructor(maxSize?: number) {
    const requested = maxSize ?? config.historyLimit;
    this.maxSize = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : config.historyLimit;
  }

  protected abstract revert(target: T, action: A): void;
  protected abstract reapply(target: T, action: A): void;

  /**
   * Called after every undo, redo and eviction
   */
  protected announce(_notice: HistoryNotice, _action: A): void {}

  /**
   * Push a freshly applied action. Clears redo and evicts the oldest entry
   * when the bound is exceeded.
   */
  record(action: A): void {
    // Replays call raw primitives, which never record; this guards against
    // listeners that edit the target while a replay runs.
    if (this.isRestoring) return;

    this.undoStack.push(action);
    this.redoStack = [];

    while (this.undoStack.length > this.maxSize) {
      const evicted = this.undoStack.shift();
      if (evicted) {
        log.debug(`evicted "${evicted.label}"`);
        this.announce("evict", evicted);
      }
    }

    this.updateState();
  }

  /**
   * Revert the newest action
   * @returns true if an action was reverted
   */
  undo(target: T): boolean {
    if (!this.stepBack(target)) return false;
    this.updateState();
    return true;
  }

  /**
   * Replay the most recently undone action
   * @returns true if an action was replayed
   */
  redo(target: T): boolean {
    if (!this.stepForward(target)) return false;
    this.updateState();
    return true;
  }

  /**
   * Undo or redo until exactly `applied` actions are in effect (0 = before
   * the oldest kept entry). Backs a clickable history list.
   * @returns true if the target changed
   */
  jumpTo(target: T, applied: number): boolean {
    const total = this.undoStack.length + this.redoStack.length;
    if (!Number.isInteger(applied) || applied < 0 || applied > total || applied === this.undoStack.length) {
      return false;
    }
    while (this.undoStack.length > applied) {
      if (!this.stepBack(target)) break;
    }
    while (this.undoStack.length < applied) {
      if (!this.stepForward(target)) break;
    }
    this.updateState();
    return true;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Labels of undoable actions, newest first
   */
  undoLabels(): string[] {
    return this.undoStack.map((a) => a.label).reverse();
  }

  /**
   * Labels of redoable actions, next redo first
   */
  redoLabels(): string[] {
    return this.redoStack.map((a) => a.label).reverse();
  }

  /**
   * Number of undoable entries
   */
  get size(): number {
    return this.undoStack.length;
  }

  /**
   * Clear all history (e.g. after loading a document)
   */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.updateState();
  }

  private stepBack(target: T): boolean {
    const action = this.undoStack.at(-1);
    if (!action || this.isRestoring) return false;

    this.replay(() => this.revert(target, action));
    this.undoStack.pop();
    this.redoStack.push(action);
    log.debug(`undo "${action.label}"`);
    this.announce("undo", action);
    return true;
  }

  private stepForward(target: T): boolean {
    const action = this.redoStack.at(-1);
    if (!action || this.isRestoring) return false;

    this.replay(() => this.reapply(target, action));
    this.redoStack.pop();
    this.undoStack.push(action);
    log.debug(`redo "${action.label}"`);
    this.announce("redo", action);
    return true;
  }

  private replay(fn: () => void): void {
    this.isRestoring = true;
    try {
      fn();
    } finally {
      this.isRestoring = false;
    }
  }

  private updateState(): void {
    this.state.set({
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
    });
  }
}

/**
 * History of one layer stack
 */
export class HistoryManager extends BoundedHistory<HistoryAction, RestorableStack> {
  private readonly events: EventBus<PaintEvents> | undefined;

  constructor(options: HistoryOptions = {}) {
    super(options.maxSize);
    this.events = options.events;
  }

  protected revert(stack: RestorableStack, action: HistoryAction): void {
    revertAction(stack, action);
  }

  protected reapply(stack: RestorableStack, action: HistoryAction): void {
    reapplyAction(stack, action);
  }

  protected announce(notice: HistoryNotice, action: HistoryAction): void {
    switch (notice) {
      case "undo":
        this.events?.emit("history:undo", action);
        break;
      case "redo":
        this.events?.emit("history:redo", action);
        break;
      case "evict":
        this.events?.emit("history:evict", action);
        break;
    }
  }
}
