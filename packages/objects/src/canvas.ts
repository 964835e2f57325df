/**
 * Canvas host object and the recording surface it draws on.
 *
 * Each session attaches its own CanvasSurface to its context. Without a
 * surface, Canvas methods do nothing and getters report an empty canvas.
 */
import type { HostObject, VMContext } from "@uiscript/core";
import { toHex, type Rgba } from "./colors.js";
import { colorArg, intArg, noArgs, parseArgs, positional, textArg } from "./schemas.js";

export interface CanvasSurface {
  readonly width: number;
  readonly height: number;
  readonly visible: boolean;
  title: string;
  show(): void;
  hide(): void;
  setSize(width: number, height: number): void;
  render(): void;
  clear(color: Rgba): void;
  setPixel(x: number, y: number, color: Rgba): void;
  drawLine(x1: number, y1: number, x2: number, y2: number, color: Rgba): void;
  drawRect(x: number, y: number, width: number, height: number, color: Rgba, fill: boolean): void;
  drawCircle(x: number, y: number, radius: number, color: Rgba, fill: boolean): void;
  drawText(x: number, y: number, text: string, color: Rgba, size: number): void;
}

export type DrawCommand =
  | { op: "clear"; color: string }
  | { op: "pixel"; x: number; y: number; color: string }
  | { op: "line"; x1: number; y1: number; x2: number; y2: number; color: string }
  | { op: "rect"; x: number; y: number; width: number; height: number; color: string; fill: boolean }
  | { op: "circle"; x: number; y: number; radius: number; color: string; fill: boolean }
  | { op: "text"; x: number; y: number; text: string; size: number; color: string };

export interface CanvasSnapshot {
  width: number;
  height: number;
  visible: boolean;
  title: string;
  frames: DrawCommand[][];
  pending: DrawCommand[];
}

export const MIN_CANVAS_SIZE = 1;
export const MAX_CANVAS_SIZE = 4096;

function clampSize(n: number): number {
  return Math.min(MAX_CANVAS_SIZE, Math.max(MIN_CANVAS_SIZE, Math.trunc(n)));
}

export const DEFAULT_MAX_FRAMES = 8;
export const DEFAULT_MAX_COMMANDS = 10_000;

export interface RecordingLimits {
  /** Rendered frames kept; older frames are dropped first. */
  maxFrames?: number;
  /** Commands kept in the pending list; older commands are dropped first. */
  maxCommands?: number;
}

/**
 * Keeps a display list of draw commands. `render()` copies the list into a
 * frame; `clear()` starts a new list. Both the frame history and the list are
 * bounded.
 */
export class RecordingSurface implements CanvasSurface {
  title = "";
  private w: number;
  private h: number;
  private shown = false;
  private commands: DrawCommand[] = [];
  private readonly rendered: DrawCommand[][] = [];
  private readonly maxFrames: number;
  private readonly maxCommands: number;

  constructor(width = 320, height = 240, limits: RecordingLimits = {}) {
    this.w = clampSize(width);
    this.h = clampSize(height);
    this.maxFrames = Math.max(1, Math.trunc(limits.maxFrames ?? DEFAULT_MAX_FRAMES));
    this.maxCommands = Math.max(1, Math.trunc(limits.maxCommands ?? DEFAULT_MAX_COMMANDS));
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  get visible(): boolean {
    return this.shown;
  }

  get frames(): readonly DrawCommand[][] {
    return this.rendered;
  }

  get pending(): readonly DrawCommand[] {
    return this.commands;
  }

  show(): void {
    this.shown = true;
  }

  hide(): void {
    this.shown = false;
  }

  setSize(width: number, height: number): void {
    this.w = clampSize(width);
    this.h = clampSize(height);
  }

  render(): void {
    this.rendered.push([...this.commands]);
    if (this.rendered.length > this.maxFrames) {
      this.rendered.splice(0, this.rendered.length - this.maxFrames);
    }
  }

  clear(color: Rgba): void {
    this.commands = [{ op: "clear", color: toHex(color) }];
  }

  setPixel(x: number, y: number, color: Rgba): void {
    this.record({ op: "pixel", x, y, color: toHex(color) });
  }

  drawLine(x1: number, y1: number, x2: number, y2: number, color: Rgba): void {
    this.record({ op: "line", x1, y1, x2, y2, color: toHex(color) });
  }

  drawRect(x: number, y: number, width: number, height: number, color: Rgba, fill: boolean): void {
    this.record({ op: "rect", x, y, width, height, color: toHex(color), fill });
  }

  drawCircle(x: number, y: number, radius: number, color: Rgba, fill: boolean): void {
    this.record({ op: "circle", x, y, radius, color: toHex(color), fill });
  }

  drawText(x: number, y: number, text: string, color: Rgba, size: number): void {
    this.record({ op: "text", x, y, text, size, color: toHex(color) });
  }

  private record(command: DrawCommand): void {
    this.commands.push(command);
    if (this.commands.length > this.maxCommands) {
      this.commands.splice(0, this.commands.length - this.maxCommands);
    }
  }

  snapshot(): CanvasSnapshot {
    return {
      width: this.w,
      height: this.h,
      visible: this.shown,
      title: this.title,
      frames: this.rendered.map((f) => [...f]),
      pending: [...this.commands],
    };
  }
}

const SURFACE_KEY = "canvas.surface";
const LAST_RESIZE_KEY = "canvas.lastResize";

function isSurface(value: unknown): value is CanvasSurface {
  return typeof value === "object" && value !== null && "drawLine" in value && typeof value.drawLine === "function";
}

export function attachCanvas(context: VMContext, surface: CanvasSurface): void {
  context.setInternal(SURFACE_KEY, surface);
  context.deleteInternal(LAST_RESIZE_KEY);
}

export function canvasOf(context: VMContext): CanvasSurface | null {
  const surface = context.getInternal(SURFACE_KEY);
  return isSurface(surface) ? surface : null;
}

export interface CanvasOptions {
  /** Minimum time between two applied `setSize` calls. */
  resizeCooldownMs?: number;
  clock?: () => number;
}

export const DEFAULT_RESIZE_COOLDOWN_MS = 10_000;

const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 255 };

const sizeArgs = positional({ width: intArg, height: intArg });
const titleArgs = positional({ title: textArg });
const clearArgs = positional({ color: colorArg.optional() });
const pixelArgs = positional({ color: colorArg, x: intArg, y: intArg });
const lineArgs = positional({ color: colorArg, x1: intArg, y1: intArg, x2: intArg, y2: intArg });
const rectArgs = positional({ color: colorArg, x: intArg, y: intArg, width: intArg, height: intArg });
const circleArgs = positional({ color: colorArg, x: intArg, y: intArg, radius: intArg });
const textDrawArgs = positional({ color: colorArg, x: intArg, y: intArg, text: textArg, size: intArg.default(12) });

export function createCanvasObject(options: CanvasOptions = {}): HostObject {
  const cooldown = options.resizeCooldownMs ?? DEFAULT_RESIZE_COOLDOWN_MS;
  const clock = options.clock ?? Date.now;

  return {
    name: "Canvas",
    methods: {
      show: (_t, args, ctx) => {
        parseArgs("Canvas.show", noArgs, args);
        canvasOf(ctx)?.show();
        return null;
      },
      hide: (_t, args, ctx) => {
        parseArgs("Canvas.hide", noArgs, args);
        canvasOf(ctx)?.hide();
        return null;
      },
      render: (_t, args, ctx) => {
        parseArgs("Canvas.render", noArgs, args);
        canvasOf(ctx)?.render();
        return null;
      },
      setTitle: (_t, args, ctx) => {
        const { title } = parseArgs("Canvas.setTitle", titleArgs, args);
        const surface = canvasOf(ctx);
        if (surface) surface.title = title;
        return null;
      },
      // Returns false when the call falls inside the cooldown window.
      setSize: (_t, args, ctx) => {
        const { width, height } = parseArgs("Canvas.setSize", sizeArgs, args);
        const surface = canvasOf(ctx);
        if (!surface) return false;
        const now = clock();
        const last = ctx.getInternal(LAST_RESIZE_KEY);
        if (typeof last === "number" && now - last < cooldown) return false;
        ctx.setInternal(LAST_RESIZE_KEY, now);
        surface.setSize(width, height);
        return true;
      },
      clear: (_t, args, ctx) => {
        const { color } = parseArgs("Canvas.clear", clearArgs, args);
        canvasOf(ctx)?.clear(color ?? BLACK);
        return null;
      },
      setPixel: (_t, args, ctx) => {
        const { color, x, y } = parseArgs("Canvas.setPixel", pixelArgs, args);
        canvasOf(ctx)?.setPixel(x, y, color);
        return null;
      },
      drawLine: (_t, args, ctx) => {
        const { color, x1, y1, x2, y2 } = parseArgs("Canvas.drawLine", lineArgs, args);
        canvasOf(ctx)?.drawLine(x1, y1, x2, y2, color);
        return null;
      },
      drawRect: (_t, args, ctx) => {
        const { color, x, y, width, height } = parseArgs("Canvas.drawRect", rectArgs, args);
        canvasOf(ctx)?.drawRect(x, y, width, height, color, false);
        return null;
      },
      fillRect: (_t, args, ctx) => {
        const { color, x, y, width, height } = parseArgs("Canvas.fillRect", rectArgs, args);
        canvasOf(ctx)?.drawRect(x, y, width, height, color, true);
        return null;
      },
      drawCircle: (_t, args, ctx) => {
        const { color, x, y, radius } = parseArgs("Canvas.drawCircle", circleArgs, args);
        canvasOf(ctx)?.drawCircle(x, y, radius, color, false);
        return null;
      },
      fillCircle: (_t, args, ctx) => {
        const { color, x, y, radius } = parseArgs("Canvas.fillCircle", circleArgs, args);
        canvasOf(ctx)?.drawCircle(x, y, radius, color, true);
        return null;
      },
      drawText: (_t, args, ctx) => {
        const { color, x, y, text, size } = parseArgs("Canvas.drawText", textDrawArgs, args);
        canvasOf(ctx)?.drawText(x, y, text, color, size);
        return null;
      },
    },
    getters: {
      width: (_t, ctx) => canvasOf(ctx)?.width ?? 0,
      height: (_t, ctx) => canvasOf(ctx)?.height ?? 0,
      visible: (_t, ctx) => canvasOf(ctx)?.visible ?? false,
      title: (_t, ctx) => canvasOf(ctx)?.title ?? "",
    },
    setters: {
      title: (_t, value, ctx) => {
        const { title } = parseArgs("Canvas.title", titleArgs, [value]);
        const surface = canvasOf(ctx);
        if (surface) surface.title = title;
      },
    },
  };
}

