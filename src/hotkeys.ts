import { EventEmitter } from "events";
import keyNames from "../data/keycodes.json" with { type: "json" };
import type { HotkeyAction, HotkeyConfig } from "./types.js";

export const MODIFIER_COMMAND = 0x100;
export const MODIFIER_SHIFT = 0x200;
export const MODIFIER_OPTION = 0x800;
export const MODIFIER_CONTROL = 0x1000;

const MODIFIER_GLYPHS: ReadonlyArray<[number, string]> = [
  [MODIFIER_COMMAND, "⌘"],
  [MODIFIER_SHIFT, "⇧"],
  [MODIFIER_OPTION, "⌥"],
  [MODIFIER_CONTROL, "⌃"]
];

const KEY_NAMES: Readonly<Record<string, string>> = keyNames;

export function keyName(keyCode: number): string | undefined {
  return KEY_NAMES[String(keyCode)];
}

export function describeHotkey(config: HotkeyConfig): string {
  const parts = MODIFIER_GLYPHS.filter(([mask]) => (config.modifiers & mask) !== 0).map(([, glyph]) => glyph);
  const key = keyName(config.keyCode);
  if (key) {
    parts.push(key);
  }
  return parts.join("");
}

/** Recorded bindings need at least one modifier, otherwise plain typing would trigger them. */
export function recordHotkey(keyCode: number, modifiers: number): HotkeyConfig | null {
  const known = MODIFIER_GLYPHS.reduce((mask, [bit]) => mask | bit, 0);
  const effective = modifiers & known;
  if (effective === 0) {
    return null;
  }
  return { keyCode, modifiers: effective };
}

export interface HotkeySource {
  on(action: HotkeyAction, listener: () => void): () => void;
}

/** In-process hotkey signal source. Whatever registers the OS-level shortcuts calls `trigger`. */
export class HotkeyChannel implements HotkeySource {
  private readonly emitter = new EventEmitter();

  on(action: HotkeyAction, listener: () => void): () => void {
    this.emitter.on(action, listener);
    return () => this.emitter.off(action, listener);
  }

  trigger(action: HotkeyAction): void {
    this.emitter.emit(action);
  }
}

export const HOTKEY_ACTIONS: readonly HotkeyAction[] = ["start", "pauseResume", "stop"];

export type HotkeyHandlers = Record<HotkeyAction, () => void>;

export function bindHotkeys(source: HotkeySource, handlers: HotkeyHandlers): () => void {
  const unsubscribers = HOTKEY_ACTIONS.map(action => source.on(action, handlers[action]));
  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
