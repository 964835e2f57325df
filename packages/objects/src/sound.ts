/**
 * Sound and SoundInstance host objects.
 *
 * A SoundBank holds the named note sequences of one session. Scripts get a
 * SoundInstance handle from `Sound.create` or `Sound.get` and call methods on
 * it; the handle's id is the sound's name.
 */
import { hostHandle, type HostHandle, type HostObject, type VMContext } from "@uiscript/core";
import { boolArg, nameArg, noArgs, numberArg, parseArgs, positional } from "./schemas.js";

export interface Note {
  pitch: number;
  duration: number;
  velocity: number;
}

export const MAX_SOUNDS = 100;
export const MAX_NOTES = 1000;

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

export class Sound {
  loop = false;
  private readonly sequence: Note[] = [];
  private active = false;

  constructor(readonly name: string) {}

  get notes(): readonly Note[] {
    return this.sequence;
  }

  get noteCount(): number {
    return this.sequence.length;
  }

  get playing(): boolean {
    return this.active;
  }

  /** Returns false once the sound holds MAX_NOTES notes. */
  addNote(pitch: number, duration: number, velocity: number): boolean {
    if (this.sequence.length >= MAX_NOTES) return false;
    this.sequence.push({
      pitch: clamp(Math.trunc(pitch), 0, 127),
      duration: clamp(duration, 0.001, 10),
      velocity: clamp(velocity, 0, 1),
    });
    return true;
  }

  clear(): void {
    this.sequence.length = 0;
    this.active = false;
  }

  play(): void {
    this.active = this.sequence.length > 0;
  }

  stop(): void {
    this.active = false;
  }
}

export class SoundBank {
  private readonly sounds = new Map<string, Sound>();

  constructor(readonly capacity = MAX_SOUNDS) {}

  get size(): number {
    return this.sounds.size;
  }

  /** The existing sound when `name` is taken, null when the bank is full. */
  create(name: string): Sound | null {
    const existing = this.get(name);
    if (existing) return existing;
    if (this.sounds.size >= this.capacity) return null;
    const sound = new Sound(name);
    this.sounds.set(name.toLowerCase(), sound);
    return sound;
  }

  get(name: string): Sound | null {
    return this.sounds.get(name.toLowerCase()) ?? null;
  }

  has(name: string): boolean {
    return this.sounds.has(name.toLowerCase());
  }

  destroy(name: string): boolean {
    const sound = this.get(name);
    if (!sound) return false;
    sound.stop();
    return this.sounds.delete(name.toLowerCase());
  }

  names(): string[] {
    return [...this.sounds.values()].map((s) => s.name);
  }

  destroyAll(): void {
    for (const sound of this.sounds.values()) sound.stop();
    this.sounds.clear();
  }
}

const BANK_KEY = "sound.bank";

export function attachSoundBank(context: VMContext, bank: SoundBank): void {
  context.setInternal(BANK_KEY, bank);
}

export function soundBankOf(context: VMContext): SoundBank | null {
  const bank = context.getInternal(BANK_KEY);
  return bank instanceof SoundBank ? bank : null;
}

function instanceHandle(sound: Sound): HostHandle {
  return hostHandle("SoundInstance", sound.name);
}

const nameArgs = positional({ name: nameArg });
const noteArgs = positional({ pitch: numberArg, duration: numberArg, velocity: numberArg.default(0.7) });
const loopArgs = positional({ loop: boolArg });

export function createSoundObject(): HostObject {
  return {
    name: "Sound",
    methods: {
      create: (_t, args, ctx) => {
        const { name } = parseArgs("Sound.create", nameArgs, args);
        const sound = soundBankOf(ctx)?.create(name);
        return sound ? instanceHandle(sound) : null;
      },
      get: (_t, args, ctx) => {
        const { name } = parseArgs("Sound.get", nameArgs, args);
        const sound = soundBankOf(ctx)?.get(name);
        if (!sound) throw new Error(`Sound '${name}' not found. Create it first with Sound.create().`);
        return instanceHandle(sound);
      },
      destroy: (_t, args, ctx) => {
        const { name } = parseArgs("Sound.destroy", nameArgs, args);
        return soundBankOf(ctx)?.destroy(name) ?? false;
      },
      exists: (_t, args, ctx) => {
        const { name } = parseArgs("Sound.exists", nameArgs, args);
        return soundBankOf(ctx)?.has(name) ?? false;
      },
    },
  };
}

/** The live sound behind `target`, or null once it has been destroyed. */
function lookup(target: HostHandle, ctx: VMContext): Sound | null {
  return soundBankOf(ctx)?.get(target.id) ?? null;
}

function liveSound(target: HostHandle, ctx: VMContext): Sound {
  const sound = lookup(target, ctx);
  if (!sound) throw new Error(`Sound '${target.id}' no longer exists.`);
  return sound;
}

export function createSoundInstanceObject(): HostObject {
  return {
    name: "SoundInstance",
    global: false,
    methods: {
      addNote: (target, args, ctx) => {
        const { pitch, duration, velocity } = parseArgs("SoundInstance.addNote", noteArgs, args);
        return liveSound(target, ctx).addNote(pitch, duration, velocity);
      },
      play: (target, args, ctx) => {
        parseArgs("SoundInstance.play", noArgs, args);
        liveSound(target, ctx).play();
        return null;
      },
      clear: (target, args, ctx) => {
        parseArgs("SoundInstance.clear", noArgs, args);
        lookup(target, ctx)?.clear();
        return null;
      },
      stop: (target, args, ctx) => {
        parseArgs("SoundInstance.stop", noArgs, args);
        lookup(target, ctx)?.stop();
        return null;
      },
      setLoop: (target, args, ctx) => {
        const { loop } = parseArgs("SoundInstance.setLoop", loopArgs, args);
        liveSound(target, ctx).loop = loop;
        return null;
      },
    },
    getters: {
      isPlaying: (target, ctx) => lookup(target, ctx)?.playing ?? false,
      loop: (target, ctx) => lookup(target, ctx)?.loop ?? false,
      noteCount: (target, ctx) => lookup(target, ctx)?.noteCount ?? 0,
    },
  };
}
