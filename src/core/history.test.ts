import { describe, expect, it, vi } from "vitest";
import { HistoryManager } from "./history";
import { LayerStack } from "./layer-stack";
import { BrushEngine } from "./brush-engine";
import { PixelBuffer } from "./pixel-buffer";
import { EventBus, type PaintEvents } from "./event-bus";

const CANVAS = { width: 6, height: 6 };
const RED = { r: 255, g: 0, b: 0, a: 255 };
const BLUE = { r: 0, g: 0, b: 255, a: 255 };
const GREEN = { r: 0, g: 255, b: 0, a: 128 };

function setup(maxSize = 10): { stack: LayerStack; history: HistoryManager } {
  const stack = new LayerStack(CANVAS);
  stack.replacePixels(0, PixelBuffer.create(6, 6, RED));
  stack.addLayer({ name: "A", pixels: PixelBuffer.create(6, 6, BLUE), opacity: 0.5 });
  stack.addLayer({ name: "B", pixels: PixelBuffer.create(6, 6, GREEN), blendMode: "multiply" });
  stack.selectLayer(1);

  const history = new HistoryManager({ maxSize });
  stack.setActionRecorder((action) => history.record(action));
  return { stack, history };
}

const brush = new BrushEngine();

const mutations: Record<string, (stack: LayerStack) => boolean> = {
  addLayer: (s) => s.addLayer({ name: "New" }) !== null,
  deleteLayer: (s) => s.deleteLayer(1),
  deleteTop: (s) => s.deleteLayer(2),
  moveLayer: (s) => s.moveLayer(0, 2),
  setVisibility: (s) => s.setVisibility(1, false),
  setOpacity: (s) => s.setOpacity(1, 0.3),
  setBlendMode: (s) => s.setBlendMode(1, "overlay"),
  setLocked: (s) => s.setLocked(1, true),
  renameLayer: (s) => s.renameLayer(1, "Renamed"),
  strokeApplied: (s) => s.applyStroke(brush.buildStroke([{ x: 1, y: 1 }, { x: 5, y: 5 }]), brush),
  pixelsReplaced: (s) => s.replacePixels(2, null),
  filter: (s) => s.applyFilter(0, "sepia"),
  mergeDown: (s) => s.mergeLayers(2, 1),
  mergeUpward: (s) => s.mergeLayers(0, 2),
  transform: (s) => s.transformLayer(1, { kind: "crop", rect: { x: 1, y: 1, width: 3, height: 3 } }),
};

describe("undo/redo round trip", () => {
  for (const [name, mutate] of Object.entries(mutations)) {
    it(`restores ${name} exactly`, () => {
      const { stack, history } = setup();
      const before = stack.clone();
      expect(mutate(stack)).toBe(true);
      const after = stack.clone();
      expect(after.equals(before)).toBe(false);

      expect(history.undo(stack)).toBe(true);
      expect(stack.equals(before)).toBe(true);

      expect(history.redo(stack)).toBe(true);
      expect(stack.equals(after)).toBe(true);
    });
  }

  it("unwinds a sequence of edits in order", () => {
    const { stack, history } = setup(50);
    const initial = stack.clone();
    for (const mutate of Object.values(mutations)) {
      mutate(stack);
    }
    const final = stack.clone();

    const recorded = history.size;
    for (let i = 0; i < recorded; i++) history.undo(stack);
    expect(history.canUndo()).toBe(false);
    expect(stack.equals(initial)).toBe(true);

    for (let i = 0; i < recorded; i++) history.redo(stack);
    expect(history.canRedo()).toBe(false);
    expect(stack.equals(final)).toBe(true);
  });
});

describe("merging masked layers", () => {
  it("puts the removed masks back on undo", () => {
    const { stack, history } = setup();
    const half = PixelBuffer.create(6, 6, { r: 0, g: 0, b: 0, a: 128 });
    stack.addLayer({ name: "Mask A", isMask: true, parentLayerId: stack.layers[1].id, pixels: half });
    stack.selectLayer(3);
    stack.addLayer({ name: "Mask B", isMask: true, parentLayerId: stack.layers[3].id, pixels: half });
    history.clear();
    const before = stack.clone();

    expect(stack.mergeLayers(3, 1)).toBe(true);
    const after = stack.clone();
    expect(after.layers.map((l) => l.name)).toEqual(["Background", "A"]);
    expect(history.undoLabels()).toEqual(["Merge Layers"]);

    history.undo(stack);
    expect(stack.equals(before)).toBe(true);
    expect(stack.currentIndex).toBe(4);
    history.redo(stack);
    expect(stack.equals(after)).toBe(true);
    expect(stack.currentIndex).toBe(1);
  });
});

describe("jumpTo", () => {
  function renamed(): { stack: LayerStack; history: HistoryManager } {
    const { stack, history } = setup();
    stack.renameLayer(1, "One");
    stack.renameLayer(1, "Two");
    stack.renameLayer(1, "Three");
    return { stack, history };
  }

  it("undoes back to an earlier entry", () => {
    const { stack, history } = renamed();
    expect(history.jumpTo(stack, 1)).toBe(true);
    expect(stack.layers[1].name).toBe("One");
    expect(history.size).toBe(1);
    expect(history.redoLabels()).toEqual(["Rename Layer", "Rename Layer"]);

    expect(history.jumpTo(stack, 0)).toBe(true);
    expect(stack.layers[1].name).toBe("A");
  });

  it("redoes forward again", () => {
    const { stack, history } = renamed();
    history.jumpTo(stack, 0);
    expect(history.jumpTo(stack, 3)).toBe(true);
    expect(stack.layers[1].name).toBe("Three");
    expect(history.state.get()).toEqual({ canUndo: true, canRedo: false });
  });

  it("refuses the current position and positions out of range", () => {
    const { stack, history } = renamed();
    expect(history.jumpTo(stack, 3)).toBe(false);
    expect(history.jumpTo(stack, 4)).toBe(false);
    expect(history.jumpTo(stack, -1)).toBe(false);
    expect(history.jumpTo(stack, 1.5)).toBe(false);
    expect(stack.layers[1].name).toBe("Three");
  });
});

describe("HistoryManager", () => {
  it("is a no-op on empty stacks", () => {
    const { stack, history } = setup();
    const before = stack.clone();
    expect(history.undo(stack)).toBe(false);
    expect(history.redo(stack)).toBe(false);
    expect(stack.equals(before)).toBe(true);
  });

  it("evicts the oldest entry past its bound", () => {
    const { stack, history } = setup(2);
    stack.addLayer();
    stack.addLayer();
    stack.addLayer();

    expect(history.size).toBe(2);
    expect(history.canUndo()).toBe(true);
    expect(history.undo(stack)).toBe(true);
    expect(history.undo(stack)).toBe(true);
    expect(history.undo(stack)).toBe(false);
    expect(stack.layers.map((l) => l.name)).toEqual(["Background", "A", "Layer 3", "B"]);
  });

  it("drops the redo stack on a new edit", () => {
    const { stack, history } = setup();
    stack.renameLayer(1, "One");
    history.undo(stack);
    expect(history.canRedo()).toBe(true);

    stack.renameLayer(1, "Two");
    expect(history.canRedo()).toBe(false);
    expect(history.redo(stack)).toBe(false);
    expect(stack.layers[1].name).toBe("Two");
  });

  it("lists labels newest first", () => {
    const { stack, history } = setup();
    stack.setVisibility(1, false);
    stack.addLayer();
    stack.moveLayer(0, 1);
    history.undo(stack);

    expect(history.undoLabels()).toEqual(["Add Layer", "Hide Layer"]);
    expect(history.redoLabels()).toEqual(["Move Layer"]);
  });

  it("publishes its state", () => {
    const { stack, history } = setup();
    const states: { canUndo: boolean; canRedo: boolean }[] = [];
    history.state.subscribe((s) => states.push(s));

    stack.setOpacity(0, 0.1);
    history.undo(stack);
    history.redo(stack);
    history.clear();

    expect(states).toEqual([
      { canUndo: true, canRedo: false },
      { canUndo: false, canRedo: true },
      { canUndo: true, canRedo: false },
      { canUndo: false, canRedo: false },
    ]);
  });

  it("announces undo, redo and eviction on its bus", () => {
    const events = new EventBus<PaintEvents>();
    const stack = new LayerStack(CANVAS);
    const history = new HistoryManager({ maxSize: 1, events });
    stack.setActionRecorder((a) => history.record(a));
    const onUndo = vi.fn();
    const onRedo = vi.fn();
    const onEvict = vi.fn();
    events.on("history:undo", onUndo);
    events.on("history:redo", onRedo);
    events.on("history:evict", onEvict);

    stack.renameLayer(0, "First");
    stack.renameLayer(0, "Second");
    history.undo(stack);
    history.redo(stack);

    expect(onEvict).toHaveBeenCalledWith(expect.objectContaining({ kind: "renameLayer", after: "First" }));
    expect(onUndo).toHaveBeenCalledWith(expect.objectContaining({ after: "Second" }));
    expect(onRedo).toHaveBeenCalledTimes(1);
  });

  it("keeps at least one entry", () => {
    expect(new HistoryManager({ maxSize: 0 }).maxSize).toBe(1);
    expect(new HistoryManager({ maxSize: 7.9 }).maxSize).toBe(7);
  });
});
