/**
 * Animation Timeline
 *
 * An ordered list of frames, each with its own LayerStack, plus a playback
 * cursor. Frame numbers are 1-based and contiguous: a frame's number is its
 * position in the list.
 *
 * New frames copy the current frame's layers under fresh ids. Buffers are
 * shared: they are immutable, so the copy is pixel-identical yet editing one
 * frame never touches the other.
 *
 * The timeline has one undo history covering both kinds of change:
 * - layer edits on any frame, recorded through each frame stack's recorder
 * - frame list edits (add, duplicate, delete, move, duration), recorded as
 *   whole snapshots of the frame list
 */
import { randomUUID } from "node:crypto";
import type { Color, Size } from "./types";
import { PixelBuffer } from "./pixel-buffer";
import type { LayerStack } from "./layer-stack";
import { createLayer } from "./layer";
import { type CompositeOptions, backgroundFor, blitLayer, compositeLayers } from "./compositor";
import { TRANSPARENT } from "./color";
import type { PaintDocument } from "./document";
import { BoundedHistory } from "./history";
import { type HistoryAction, reapplyAction, revertAction } from "./history-actions";
import { invariant } from "./errors";
import { Store } from "./stores";
import { config } from "./config";
import { scopedLogger } from "./logger";

const log = scopedLogger("animation");

export interface AnimationFrame {
  readonly id: string;
  /** 1-based position in the timeline */
  readonly frameNumber: number;
  readonly durationMs: number;
  readonly layers: LayerStack;
}

export interface AnimationSettings {
  onionSkinning: boolean;
  onionSkinBefore: number;
  onionSkinAfter: number;
  onionSkinOpacity: number;
  frameRate: number;
}

export interface PlaybackState {
  currentIndex: number;
  frameCount: number;
  isPlaying: boolean;
  frameRate: number;
}

export interface OnionSkinFrame {
  frame: AnimationFrame;
  opacity: number;
  /** Frames away from the current one (always ≥ 1) */
  distance: number;
  side: "before" | "after";
}

export interface RenderedFrame {
  buffer: PixelBuffer;
  durationMs: number;
}

export interface FrameEntry {
  readonly id: string;
  readonly durationMs: number;
  readonly layers: LayerStack;
}

/**
 * The frame list at one point in time. Entries are immutable, so holding
 * the array is a full snapshot of order and durations.
 */
export interface FrameListSnapshot {
  readonly frames: readonly FrameEntry[];
  readonly current: number;
}

/** A layer edit made on one frame's stack */
export interface FrameEditAction {
  kind: "frameEdit";
  label: string;
  timestamp: number;
  frameId: string;
  action: HistoryAction;
}

/** Frames added, removed, reordered or retimed */
export interface FrameListAction {
  kind: "frameList";
  label: string;
  timestamp: number;
  before: FrameListSnapshot;
  after: FrameListSnapshot;
}

export type TimelineAction = FrameEditAction | FrameListAction;

/**
 * Replay primitives the timeline history works through
 */
export interface RestorableTimeline {
  frameLayers(frameId: string): LayerStack | undefined;
  restoreFrames(snapshot: FrameListSnapshot): void;
}

function frameStack(timeline: RestorableTimeline, frameId: string): LayerStack {
  const stack = timeline.frameLayers(frameId);
  invariant(stack, `timeline history out of sync: frame ${frameId} is missing`);
  return stack;
}

export class TimelineHistory extends BoundedHistory<TimelineAction, RestorableTimeline> {
  protected revert(timeline: RestorableTimeline, entry: TimelineAction): void {
    if (entry.kind === "frameEdit") {
      revertAction(frameStack(timeline, entry.frameId), entry.action);
    } else {
      timeline.restoreFrames(entry.before);
    }
  }

  protected reapply(timeline: RestorableTimeline, entry: TimelineAction): void {
    if (entry.kind === "frameEdit") {
      reapplyAction(frameStack(timeline, entry.frameId), entry.action);
    } else {
      timeline.restoreFrames(entry.after);
    }
  }
}

export function defaultAnimationSettings(): AnimationSettings {
  return {
    onionSkinning: false,
    onionSkinBefore: 1,
    onionSkinAfter: 1,
    onionSkinOpacity: 0.3,
    frameRate: config.frameRate,
  };
}

function frameDuration(frameRate: number): number {
  return Math.floor(1000 / frameRate);
}

export class AnimationTimeline implements RestorableTimeline {
  private frames: readonly FrameEntry[];
  private current = 0;
  private playing = false;
  private timer: ReturnType<typeof setInterval> | null = null;

  readonly canvas: Readonly<Size>;
  readonly settings: AnimationSettings;
  readonly state: Store<PlaybackState>;
  readonly history: TimelineHistory;
  /** Fill behind rendered frames */
  readonly background: Readonly<Color>;

  /**
   * @param layers - first frame's stack; the timeline takes over its action recorder
   * @param historyLimit - undo depth; defaults to PAINT_HISTORY_LIMIT
   */
  constructor(
    canvas: Size,
    layers: LayerStack,
    settings: Partial<AnimationSettings> = {},
    background: Readonly<Color> = TRANSPARENT,
    historyLimit?: number,
  ) {
    this.canvas = Object.freeze({ width: canvas.width, height: canvas.height });
    this.background = background;
    this.settings = { ...defaultAnimationSettings(), ...settings };
    if (!(this.settings.frameRate > 0)) this.settings.frameRate = config.frameRate;
    this.history = new TimelineHistory(historyLimit);

    this.frames = [this.adopt(randomUUID(), frameDuration(this.settings.frameRate), layers)];
    this.state = new Store<PlaybackState>(this.snapshot());
  }

  /**
   * Timeline whose first frame holds a copy of the document's layers. The
   * two stay independent afterwards: drawing on the document does not reach
   * the timeline, and frame edits are undone through the timeline's own
   * history, not the document's.
   */
  static fromDocument(document: PaintDocument, settings: Partial<AnimationSettings> = {}): AnimationTimeline {
    return new AnimationTimeline(
      document.layers.canvas,
      document.layers.clone(),
      settings,
      backgroundFor(document.colorMode),
      document.history.maxSize,
    );
  }

  // ============================================================
  // Queries
  // ============================================================

  get frameCount(): number {
    return this.frames.length;
  }

  get currentIndex(): number {
    return this.current;
  }

  get currentFrame(): AnimationFrame {
    return this.view(this.current);
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  get frameRate(): number {
    return this.settings.frameRate;
  }

  get totalDurationMs(): number {
    return this.frames.reduce((sum, f) => sum + f.durationMs, 0);
  }

  frameAt(index: number): AnimationFrame | undefined {
    return this.isValidIndex(index) ? this.view(index) : undefined;
  }

  getFrames(): readonly AnimationFrame[] {
    return this.frames.map((_, i) => this.view(i));
  }

  // ============================================================
  // Frame editing
  // ============================================================

  /**
   * Insert a copy of the current frame right after it and select the copy
   */
  addFrame(): AnimationFrame {
    return this.insertCopy(frameDuration(this.settings.frameRate), "Add Frame");
  }

  /**
   * Like addFrame, but the copy keeps the source frame's duration
   */
  duplicateFrame(): AnimationFrame {
    return this.insertCopy(this.frames[this.current].durationMs, "Duplicate Frame");
  }

  deleteFrame(index = this.current): boolean {
    if (!this.isValidIndex(index)) return false;
    if (this.frames.length === 1) {
      log.debug("refusing to delete the last frame");
      return false;
    }
    const frames = this.frames.filter((_, i) => i !== index);
    let current = this.current > index ? this.current - 1 : this.current;
    current = Math.min(current, frames.length - 1);
    this.commitFrames("Delete Frame", frames, current);
    return true;
  }

  moveFrame(from: number, to: number): boolean {
    if (!this.isValidIndex(from) || !this.isValidIndex(to) || from === to) return false;
    const frames = this.frames.slice();
    const [frame] = frames.splice(from, 1);
    frames.splice(to, 0, frame);

    let current = this.current;
    if (current === from) {
      current = to;
    } else if (from < current && to >= current) {
      current--;
    } else if (from > current && to <= current) {
      current++;
    }
    this.commitFrames("Move Frame", frames, current);
    return true;
  }

  setFrameDuration(index: number, durationMs: number): boolean {
    if (!this.isValidIndex(index) || !Number.isFinite(durationMs) || durationMs <= 0) return false;
    const rounded = Math.round(durationMs);
    if (this.frames[index].durationMs === rounded) return false;
    const frames = this.frames.map((f, i) => (i === index ? { ...f, durationMs: rounded } : f));
    this.commitFrames("Frame Duration", frames, this.current);
    return true;
  }

  // ============================================================
  // Undo / redo
  // ============================================================

  undo(): boolean {
    return this.history.undo(this);
  }

  redo(): boolean {
    return this.history.redo(this);
  }

  /**
   * Undo or redo until `applied` recorded edits are in effect
   */
  jumpTo(applied: number): boolean {
    return this.history.jumpTo(this, applied);
  }

  /**
   * Layers of the frame with this id, if it is in the timeline
   */
  frameLayers(frameId: string): LayerStack | undefined {
    return this.frames.find((f) => f.id === frameId)?.layers;
  }

  /**
   * Put back a recorded frame list (history replay only)
   */
  restoreFrames(snapshot: FrameListSnapshot): void {
    invariant(snapshot.frames.length > 0, "restoreFrames: a timeline needs at least one frame");
    this.frames = snapshot.frames;
    this.current = Math.min(Math.max(0, snapshot.current), snapshot.frames.length - 1);
    this.publish();
  }

  // ============================================================
  // Navigation
  // ============================================================

  selectFrame(index: number): boolean {
    if (!this.isValidIndex(index)) return false;
    this.current = index;
    this.publish();
    return true;
  }

  /**
   * Step forward. Wraps to the first frame only while playing.
   */
  nextFrame(): boolean {
    if (this.current < this.frames.length - 1) return this.selectFrame(this.current + 1);
    if (this.playing) return this.selectFrame(0);
    return false;
  }

  previousFrame(): boolean {
    if (this.current === 0) return false;
    return this.selectFrame(this.current - 1);
  }

  firstFrame(): boolean {
    return this.selectFrame(0);
  }

  lastFrame(): boolean {
    return this.selectFrame(this.frames.length - 1);
  }

  // ============================================================
  // Playback
  // ============================================================

  play(): void {
    if (this.playing) return;
    this.playing = true;
    this.startTimer();
    log.debug(`playing at ${this.settings.frameRate} fps`);
    this.publish();
  }

  pause(): void {
    if (!this.playing) return;
    this.playing = false;
    this.stopTimer();
    this.publish();
  }

  togglePlayback(): void {
    if (this.playing) {
      this.pause();
    } else {
      this.play();
    }
  }

  /**
   * Change playback speed. Ignored unless positive; a running timer is
   * restarted at the new rate.
   */
  setFrameRate(frameRate: number): boolean {
    if (!Number.isFinite(frameRate) || frameRate <= 0) return false;
    this.settings.frameRate = frameRate;
    if (this.playing) {
      this.stopTimer();
      this.startTimer();
    }
    this.publish();
    return true;
  }

  /**
   * Stop playback and release the timer
   */
  dispose(): void {
    this.pause();
  }

  // ============================================================
  // Onion skin
  // ============================================================

  /**
   * Neighbouring frames with fading opacity: preceding frames first
   * (nearest first), then following ones. The frame at distance `i` on a
   * side with `count` frames requested gets `baseOpacity × (1 − (i−1)/count)`.
   */
  onionSkin(
    before = this.settings.onionSkinBefore,
    after = this.settings.onionSkinAfter,
    baseOpacity = this.settings.onionSkinOpacity,
  ): OnionSkinFrame[] {
    const result: OnionSkinFrame[] = [];
    for (let i = 1; i <= before; i++) {
      const index = this.current - i;
      if (index < 0) break;
      result.push({
        frame: this.view(index),
        opacity: baseOpacity * (1 - (i - 1) / before),
        distance: i,
        side: "before",
      });
    }
    for (let i = 1; i <= after; i++) {
      const index = this.current + i;
      if (index >= this.frames.length) break;
      result.push({
        frame: this.view(index),
        opacity: baseOpacity * (1 - (i - 1) / after),
        distance: i,
        side: "after",
      });
    }
    return result;
  }

  /**
   * Onion skin frames from the timeline settings; empty when disabled
   */
  getOnionSkinFrames(): OnionSkinFrame[] {
    if (!this.settings.onionSkinning) return [];
    return this.onionSkin();
  }

  // ============================================================
  // Rendering
  // ============================================================

  renderFrame(index: number, options: CompositeOptions = this.defaultOptions()): PixelBuffer | null {
    const frame = this.frameAt(index);
    if (!frame) return null;
    return compositeLayers(frame.layers.layers, options);
  }

  /**
   * Current frame over its onion skins (farthest drawn first)
   */
  renderWithOnionSkin(options: CompositeOptions = this.defaultOptions()): PixelBuffer {
    const draft = PixelBuffer.draft(options.width, options.height, options.background);
    const flat = { ...options, background: TRANSPARENT };
    const skins = this.getOnionSkinFrames().sort((a, b) => b.distance - a.distance);

    for (const skin of skins) {
      const pixels = compositeLayers(skin.frame.layers.layers, flat);
      blitLayer(draft, createLayer({ name: `Onion ${skin.frame.frameNumber}`, opacity: skin.opacity, pixels }));
    }
    const current = compositeLayers(this.frames[this.current].layers.layers, flat);
    blitLayer(draft, createLayer({ name: "Current", pixels: current }));
    return draft.publish();
  }

  /**
   * Every frame flattened, in order, with its duration (for export)
   */
  renderAll(options: CompositeOptions = this.defaultOptions()): RenderedFrame[] {
    return this.frames.map((f) => ({
      buffer: compositeLayers(f.layers.layers, options),
      durationMs: f.durationMs,
    }));
  }

  // ============================================================
  // Internals
  // ============================================================

  private adopt(id: string, durationMs: number, layers: LayerStack): FrameEntry {
    layers.setActionRecorder((action) => this.recordEdit(id, action));
    return { id, durationMs, layers };
  }

  private recordEdit(frameId: string, action: HistoryAction): void {
    // a deleted frame can still be edited by whoever holds its stack
    if (!this.frameLayers(frameId)) {
      log.debug(`edit on detached frame ${frameId} not recorded`);
      return;
    }
    this.history.record({ kind: "frameEdit", label: action.label, timestamp: action.timestamp, frameId, action });
  }

  private insertCopy(durationMs: number, label: string): AnimationFrame {
    const source = this.frames[this.current];
    const frame = this.adopt(randomUUID(), durationMs, source.layers.cloneWithFreshIds());
    const frames = this.frames.slice();
    frames.splice(this.current + 1, 0, frame);
    this.commitFrames(label, frames, this.current + 1);
    return this.view(this.current);
  }

  private commitFrames(label: string, frames: readonly FrameEntry[], current: number): void {
    const before: FrameListSnapshot = { frames: this.frames, current: this.current };
    this.frames = frames;
    this.current = current;
    this.history.record({
      kind: "frameList",
      label,
      timestamp: Date.now(),
      before,
      after: { frames, current },
    });
    log.debug(label);
    this.publish();
  }

  private view(index: number): AnimationFrame {
    const { id, durationMs, layers } = this.frames[index];
    return Object.freeze({ id, frameNumber: index + 1, durationMs, layers });
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.frames.length;
  }

  private defaultOptions(): CompositeOptions {
    return { width: this.canvas.width, height: this.canvas.height, background: this.background };
  }

  private startTimer(): void {
    this.timer = setInterval(() => {
      this.nextFrame();
    }, 1000 / this.settings.frameRate);
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private snapshot(): PlaybackState {
    return {
      currentIndex: this.current,
      frameCount: this.frames.length,
      isPlaying: this.playing,
      frameRate: this.settings.frameRate,
    };
  }

  private publish(): void {
    this.state.set(this.snapshot());
  }
}
