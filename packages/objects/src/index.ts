/**
 * @uiscript/objects - Canvas and Sound host objects
 */
import type { IntrinsicRegistry, VMContext } from "@uiscript/core";
import { RecordingSurface, attachCanvas, createCanvasObject } from "./canvas.js";
import type { CanvasOptions } from "./canvas.js";
import { SoundBank, attachSoundBank, createSoundInstanceObject, createSoundObject } from "./sound.js";

export {
  DEFAULT_MAX_COMMANDS,
  DEFAULT_MAX_FRAMES,
  DEFAULT_RESIZE_COOLDOWN_MS,
  MAX_CANVAS_SIZE,
  MIN_CANVAS_SIZE,
  RecordingSurface,
  attachCanvas,
  canvasOf,
  createCanvasObject,
} from "./canvas.js";
export type { CanvasOptions, CanvasSnapshot, CanvasSurface, DrawCommand, RecordingLimits } from "./canvas.js";
export {
  MAX_NOTES,
  MAX_SOUNDS,
  Sound,
  SoundBank,
  attachSoundBank,
  createSoundInstanceObject,
  createSoundObject,
  soundBankOf,
} from "./sound.js";
export type { Note } from "./sound.js";
export { namedColors, parseColor, toHex } from "./colors.js";
export type { Rgba } from "./colors.js";
export { parseArgs, positional } from "./schemas.js";

export type HostObjectOptions = CanvasOptions;

export function registerHostObjects(registry: IntrinsicRegistry, options: HostObjectOptions = {}): IntrinsicRegistry {
  return registry
    .registerObject(createCanvasObject(options))
    .registerObject(createSoundObject())
    .registerObject(createSoundInstanceObject());
}

export interface HostState {
  surface: RecordingSurface;
  sounds: SoundBank;
}

/** Attaches a fresh recording surface and sound bank to `context`. */
export function attachHostState(context: VMContext): HostState {
  const state = { surface: new RecordingSurface(), sounds: new SoundBank() };
  attachCanvas(context, state.surface);
  attachSoundBank(context, state.sounds);
  return state;
}
