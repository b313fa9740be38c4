import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AnimationTimeline } from "./animation";
import { LayerStack } from "./layer-stack";
import { PixelBuffer } from "./pixel-buffer";
import { createDocument } from "./document";
import { createLayer } from "./layer";
import { WHITE } from "./color";

const canvas = { width: 2, height: 2 };

function redStack(): LayerStack {
  const pixels = PixelBuffer.create(2, 2, { r: 255, g: 0, b: 0, a: 255 });
  return new LayerStack(canvas, [createLayer({ name: "Ink", pixels })]);
}

function timelineOf(frames: number): AnimationTimeline {
  const timeline = new AnimationTimeline(canvas, redStack(), { frameRate: 24 });
  for (let i = 1; i < frames; i++) timeline.addFrame();
  return timeline;
}

describe("AnimationTimeline", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts with one frame", () => {
    const timeline = new AnimationTimeline(canvas, redStack(), { frameRate: 24 });
    expect(timeline.frameCount).toBe(1);
    expect(timeline.currentFrame.frameNumber).toBe(1);
    expect(timeline.currentFrame.durationMs).toBe(41);
  });

  it("adds a pixel-identical frame with its own layers", () => {
    const timeline = timelineOf(1);
    const added = timeline.addFrame();
    const first = timeline.frameAt(0);

    expect(timeline.frameCount).toBe(2);
    expect(timeline.currentIndex).toBe(1);
    expect(added.frameNumber).toBe(2);
    expect(first?.layers.layerAt(0)?.id).not.toBe(added.layers.layerAt(0)?.id);

    const a = timeline.renderFrame(0);
    const b = timeline.renderFrame(1);
    expect(a && b && a.equals(b)).toBe(true);

    added.layers.setOpacity(0, 0.5);
    expect(first?.layers.layerAt(0)?.opacity).toBe(1);
  });

  it("duplicates with the source duration", () => {
    const timeline = timelineOf(1);
    timeline.setFrameDuration(0, 100.4);
    expect(timeline.duplicateFrame().durationMs).toBe(100);
    expect(timeline.addFrame().durationMs).toBe(41);
    expect(timeline.setFrameDuration(0, 0)).toBe(false);
  });

  it("renumbers after delete and move", () => {
    const timeline = timelineOf(3);
    const third = timeline.frameAt(2);

    expect(timeline.deleteFrame(0)).toBe(true);
    expect(timeline.getFrames().map((f) => f.frameNumber)).toEqual([1, 2]);
    expect(timeline.currentIndex).toBe(1);
    expect(timeline.frameAt(1)?.id).toBe(third?.id);

    expect(timeline.moveFrame(1, 0)).toBe(true);
    expect(timeline.frameAt(0)?.id).toBe(third?.id);
    expect(timeline.frameAt(0)?.frameNumber).toBe(1);
    expect(timeline.currentIndex).toBe(0);
  });

  it("keeps the last frame", () => {
    const timeline = timelineOf(1);
    expect(timeline.deleteFrame()).toBe(false);
    expect(timeline.frameCount).toBe(1);
  });

  it("fades onion skins with distance", () => {
    const timeline = timelineOf(5);
    timeline.selectFrame(2);
    const skins = timeline.onionSkin(2, 2, 0.4);

    expect(skins.map((s) => [s.side, s.distance, s.frame.frameNumber])).toEqual([
      ["before", 1, 2],
      ["before", 2, 1],
      ["after", 1, 4],
      ["after", 2, 5],
    ]);
    expect(skins[0].opacity).toBeCloseTo(0.4);
    expect(skins[1].opacity).toBeCloseTo(0.2);
    expect(skins[3].opacity).toBeCloseTo(0.2);
  });

  it("stops at the ends when not playing", () => {
    const timeline = timelineOf(2);
    expect(timeline.nextFrame()).toBe(false);
    expect(timeline.currentIndex).toBe(1);
    timeline.firstFrame();
    expect(timeline.previousFrame()).toBe(false);
  });

  it("loops while playing", () => {
    const timeline = timelineOf(2);
    const states: number[] = [];
    timeline.state.subscribe((s) => states.push(s.currentIndex));

    timeline.play();
    expect(timeline.isPlaying).toBe(true);
    vi.advanceTimersByTime(42);
    expect(timeline.currentIndex).toBe(0);
    vi.advanceTimersByTime(42);
    expect(timeline.currentIndex).toBe(1);

    timeline.pause();
    vi.advanceTimersByTime(500);
    expect(timeline.currentIndex).toBe(1);
    expect(states).toEqual([1, 0, 1, 1]);
  });

  it("restarts the timer on a new frame rate", () => {
    const timeline = timelineOf(3);
    timeline.firstFrame();
    timeline.togglePlayback();
    expect(timeline.setFrameRate(10)).toBe(true);
    vi.advanceTimersByTime(99);
    expect(timeline.currentIndex).toBe(0);
    vi.advanceTimersByTime(1);
    expect(timeline.currentIndex).toBe(1);
    expect(timeline.setFrameRate(-1)).toBe(false);
    timeline.dispose();
    expect(timeline.isPlaying).toBe(false);
  });

  it("renders every frame with its duration", () => {
    const timeline = timelineOf(3);
    const rendered = timeline.renderAll();
    expect(rendered.map((r) => r.durationMs)).toEqual([41, 41, 41]);
    expect(rendered[2].buffer.getPixel(1, 1)).toEqual({ r: 255, g: 0, b: 0, a: 255 });
    expect(timeline.totalDurationMs).toBe(123);
    expect(timeline.renderFrame(3)).toBeNull();
  });

  it("draws onion skins under the current frame", () => {
    const timeline = new AnimationTimeline(canvas, new LayerStack(canvas), {
      onionSkinning: true,
      onionSkinBefore: 1,
      onionSkinAfter: 0,
      onionSkinOpacity: 0.5,
    });
    timeline.currentFrame.layers.replacePixels(0, PixelBuffer.create(2, 2, { r: 0, g: 0, b: 255, a: 255 }), "Fill");
    timeline.addFrame();
    timeline.currentFrame.layers.replacePixels(0, PixelBuffer.create(2, 2), "Clear");

    expect(timeline.getOnionSkinFrames()).toHaveLength(1);
    expect(timeline.renderWithOnionSkin().getPixel(0, 0)).toEqual({ r: 0, g: 0, b: 255, a: 128 });
  });

  it("starts from a document's layers on its background", () => {
    const doc = createDocument({ name: "Flip", width: 2, height: 2 });
    const timeline = AnimationTimeline.fromDocument(doc);
    expect(timeline.background).toEqual(WHITE);
    expect(timeline.currentFrame.layers).not.toBe(doc.layers);
    expect(timeline.renderFrame(0)?.getPixel(0, 0)).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });
});

describe("AnimationTimeline history", () => {
  it("undoes layer edits made on a frame", () => {
    const timeline = timelineOf(1);
    timeline.currentFrame.layers.setOpacity(0, 0.5);
    expect(timeline.history.undoLabels()).toEqual(["Layer Opacity"]);

    expect(timeline.undo()).toBe(true);
    expect(timeline.currentFrame.layers.layerAt(0)?.opacity).toBe(1);
    expect(timeline.redo()).toBe(true);
    expect(timeline.currentFrame.layers.layerAt(0)?.opacity).toBe(0.5);
  });

  it("undoes frame list edits in order with layer edits", () => {
    const timeline = timelineOf(1);
    const second = timeline.addFrame();
    second.layers.renameLayer(0, "Second ink");
    timeline.setFrameDuration(1, 200);
    timeline.deleteFrame(0);
    expect(timeline.history.undoLabels()).toEqual(["Delete Frame", "Frame Duration", "Rename Layer", "Add Frame"]);

    timeline.undo();
    expect(timeline.frameCount).toBe(2);
    expect(timeline.currentIndex).toBe(1);
    timeline.undo();
    expect(timeline.frameAt(1)?.durationMs).toBe(41);
    timeline.undo();
    expect(timeline.frameAt(1)?.layers.layerAt(0)?.name).toBe("Ink");
    timeline.undo();
    expect(timeline.frameCount).toBe(1);
    expect(timeline.currentIndex).toBe(0);
    expect(timeline.undo()).toBe(false);

    expect(timeline.jumpTo(4)).toBe(true);
    expect(timeline.frameCount).toBe(1);
    expect(timeline.currentFrame.id).toBe(second.id);
    expect(timeline.currentFrame.durationMs).toBe(200);
    expect(timeline.currentFrame.layers.layerAt(0)?.name).toBe("Second ink");
  });

  it("undoes a frame move", () => {
    const timeline = timelineOf(3);
    const ids = timeline.getFrames().map((f) => f.id);
    timeline.moveFrame(0, 2);
    expect(timeline.getFrames().map((f) => f.id)).toEqual([ids[1], ids[2], ids[0]]);

    timeline.undo();
    expect(timeline.getFrames().map((f) => f.id)).toEqual(ids);
    expect(timeline.currentIndex).toBe(2);
  });

  it("publishes playback state when a frame list edit is undone", () => {
    const timeline = timelineOf(2);
    const counts: number[] = [];
    timeline.state.subscribe((s) => counts.push(s.frameCount));
    timeline.undo();
    expect(counts).toEqual([1]);
  });

  it("does not record edits on a deleted frame", () => {
    const timeline = timelineOf(2);
    const gone = timeline.frameAt(1);
    timeline.deleteFrame(1);
    expect(gone?.layers.renameLayer(0, "Lost")).toBe(true);
    expect(timeline.history.undoLabels()).toEqual(["Delete Frame", "Add Frame"]);
  });
});

describe("AnimationTimeline.fromDocument", () => {
  it("stays independent of the document", () => {
    const doc = createDocument({ name: "Flip", width: 2, height: 2, historyLimit: 3 });
    const timeline = AnimationTimeline.fromDocument(doc);
    expect(timeline.history.maxSize).toBe(3);

    doc.layers.addLayer({ name: "Doc only" });
    expect(timeline.currentFrame.layers.length).toBe(1);

    timeline.currentFrame.layers.renameLayer(0, "Frame");
    expect(doc.layers.layerAt(0)?.name).toBe("Background");
    expect(doc.history.undoLabels()).toEqual(["Add Layer"]);
    expect(timeline.history.undoLabels()).toEqual(["Rename Layer"]);

    timeline.undo();
    expect(timeline.currentFrame.layers.layerAt(0)?.name).toBe("Background");
    expect(doc.layers.length).toBe(2);
  });
});
