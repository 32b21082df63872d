/**
 * Key Bindings and Event Routing
 *
 * Routing is a pure function of (screen, exit state): every keymap is built
 * up front from the configured bindings, and a key either maps to one event in
 * the keymap for the current state or to nothing. While the exit modal is
 * shown its keymap holds nothing but the modal's navigation keys.
 */

import type { Key } from "ink";
import { DuplicateBindingError } from "../errors.js";
import { SCREENS, type Event, type ExitState, type Screen, type Session } from "../session/state.js";

/** A key press, normalized from ink's (input, key) pair */
export interface KeyPress {
  name: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

const INK_KEY_NAMES: ReadonlyArray<[keyof Key, string]> = [
  ["upArrow", "up"],
  ["downArrow", "down"],
  ["leftArrow", "left"],
  ["rightArrow", "right"],
  ["return", "return"],
  ["tab", "tab"],
  ["escape", "escape"],
  ["backspace", "backspace"],
  ["delete", "delete"],
  ["pageUp", "pageup"],
  ["pageDown", "pagedown"],
];

/**
 * Convert ink's input callback arguments. Returns null for pasted text and
 * keys with no name.
 */
export function keyPressFromInk(input: string, key: Key): KeyPress | null {
  const named = INK_KEY_NAMES.find(([flag]) => key[flag])?.[1];
  const name = named ?? (Array.from(input).length === 1 ? input.toLowerCase() : undefined);
  if (!name) {
    return null;
  }
  return { name, ctrl: key.ctrl, meta: key.meta, shift: key.shift };
}

export interface KeyChord {
  name: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export interface KeyHint {
  keys: string;
  description: string;
}

const MODIFIERS = ["ctrl", "meta", "shift"] as const;

/**
 * Parse "ctrl+c", "shift+tab", "left" and the like
 */
export function parseChord(spec: string): KeyChord {
  const parts = spec.toLowerCase().split("+");
  const name = parts.pop();
  if (!name) {
    throw new Error(`Invalid key chord: "${spec}"`);
  }

  const chord: KeyChord = { name, ctrl: false, meta: false, shift: false };
  for (const modifier of parts) {
    if (modifier === "ctrl" || modifier === "meta" || modifier === "shift") {
      chord[modifier] = true;
    } else {
      throw new Error(`Invalid modifier "${modifier}" in key chord "${spec}"`);
    }
  }
  return chord;
}

/**
 * Canonical form used as the keymap key
 */
export function chordId(chord: KeyChord | KeyPress): string {
  const modifiers = MODIFIERS.filter((modifier) => chord[modifier]);
  return [...modifiers, chord.name].join("+");
}

const KEY_LABELS: Record<string, string> = {
  return: "Enter",
  enter: "Enter",
  escape: "Esc",
  backspace: "Backspace",
  tab: "Tab",
  left: "←",
  right: "→",
  up: "↑",
  down: "↓",
  pageup: "PgUp",
  pagedown: "PgDown",
  home: "Home",
  end: "End",
  delete: "Del",
};

/**
 * User-facing form, e.g. "Ctrl+C", "⇧+Tab", "Q"
 */
export function displayChord(chord: KeyChord): string {
  const parts: string[] = [];
  if (chord.shift) parts.push("⇧");
  if (chord.ctrl) parts.push("Ctrl");
  if (chord.meta) parts.push("Alt");
  parts.push(KEY_LABELS[chord.name] ?? chord.name.toUpperCase());
  return parts.join("+");
}

/**
 * One routing table. Binding a chord twice is a programming error.
 */
export class Keymap {
  private bindings: Map<string, Event> = new Map();
  private hintList: KeyHint[] = [];

  /**
   * Bind a chord. With a description the chord is also listed in the footer.
   */
  bind(spec: string, event: Event, description?: string): this {
    const id = chordId(parseChord(spec));
    if (this.bindings.has(id)) {
      throw new DuplicateBindingError(id);
    }
    this.bindings.set(id, event);
    if (description) {
      this.hintList.push({ keys: displayChord(parseChord(spec)), description });
    }
    return this;
  }

  /**
   * Add a footer entry covering several bound chords, e.g. "↑↓"
   */
  hint(keys: string, description: string): this {
    this.hintList.push({ keys, description });
    return this;
  }

  lookup(key: KeyPress): Event | null {
    return this.bindings.get(chordId(key)) ?? null;
  }

  get size(): number {
    return this.bindings.size;
  }

  hints(): readonly KeyHint[] {
    return this.hintList;
  }
}

export interface KeyBindingConfig {
  global: {
    exit: string;
    /** Extra chords for exit, not shown in the footer */
    exitAliases: string[];
    nextTab: string;
    prevTab: string;
    resume: string;
  };
  modal: {
    left: string;
    right: string;
    select: string;
    selectAliases: string[];
  };
  trace: {
    previousFrame: string;
    nextFrame: string;
  };
  vars: {
    previousVar: string;
    nextVar: string;
    focusList: string;
    focusDetail: string;
    rawDetail: string;
    splitDetail: string;
  };
}

export const DEFAULT_KEY_BINDINGS: KeyBindingConfig = {
  global: {
    exit: "q",
    // Raw mode turns Ctrl+C into a key instead of SIGINT
    exitAliases: ["ctrl+c"],
    nextTab: "tab",
    prevTab: "shift+tab",
    resume: "c",
  },
  modal: {
    left: "left",
    right: "right",
    select: "return",
    selectAliases: [],
  },
  trace: {
    previousFrame: "up",
    nextFrame: "down",
  },
  vars: {
    previousVar: "up",
    nextVar: "down",
    focusList: "left",
    focusDetail: "right",
    rawDetail: "r",
    splitDetail: "s",
  },
};

const MODAL_STATE = "modal";

function keymapKey(screen: Screen, exitState: ExitState): string {
  return exitState.kind === "present-modal" ? MODAL_STATE : screen;
}

export class KeyBindings {
  private config: KeyBindingConfig;
  private keymaps: Map<string, Keymap> = new Map();

  /**
   * Builds every keymap immediately, so a chord bound twice anywhere throws
   * DuplicateBindingError here rather than when a screen is first shown.
   */
  constructor(config: KeyBindingConfig = DEFAULT_KEY_BINDINGS) {
    this.config = config;
    this.keymaps.set(MODAL_STATE, this.buildModalKeymap());
    for (const screen of SCREENS) {
      this.keymaps.set(screen, this.buildScreenKeymap(screen));
    }
  }

  /**
   * The keymap in effect for a screen and exit state
   */
  keymap(screen: Screen, exitState: ExitState): Keymap {
    return this.keymaps.get(keymapKey(screen, exitState)) ?? new Keymap();
  }

  /**
   * Map a key to an event for the session's current state
   */
  route(session: Pick<Session, "screen" | "exitState">, key: KeyPress): Event | null {
    return this.keymap(session.screen, session.exitState).lookup(key);
  }

  private buildModalKeymap(): Keymap {
    const { left, right, select, selectAliases } = this.config.modal;
    const keymap = new Keymap()
      .bind(left, { type: "nav", event: "left" })
      .bind(right, { type: "nav", event: "right" })
      .hint(`${displayChord(parseChord(left))}${displayChord(parseChord(right))}`, "Choose")
      .bind(select, { type: "nav", event: "select" }, "Confirm");
    for (const alias of selectAliases) {
      keymap.bind(alias, { type: "nav", event: "select" });
    }
    return keymap;
  }

  private buildScreenKeymap(screen: Screen): Keymap {
    const { exit, exitAliases, nextTab, prevTab, resume } = this.config.global;
    const keymap = new Keymap()
      .bind(exit, { type: "app", event: "exit-requested" }, "Exit")
      .bind(nextTab, { type: "app", event: "next-tab" }, "Next Tab")
      .bind(prevTab, { type: "app", event: "prev-tab" }, "Prev Tab")
      .bind(resume, { type: "app", event: "resume" }, "Continue");
    for (const alias of exitAliases) {
      keymap.bind(alias, { type: "app", event: "exit-requested" });
    }

    switch (screen) {
      case "trace": {
        const { previousFrame, nextFrame } = this.config.trace;
        keymap
          .bind(previousFrame, { type: "trace", event: "previous-frame" })
          .bind(nextFrame, { type: "trace", event: "next-frame" })
          .hint(`${displayChord(parseChord(previousFrame))}${displayChord(parseChord(nextFrame))}`, "Frames");
        break;
      }
      case "vars": {
        const { previousVar, nextVar, focusList, focusDetail, rawDetail, splitDetail } = this.config.vars;
        keymap
          .bind(previousVar, { type: "vars", event: "previous-var" })
          .bind(nextVar, { type: "vars", event: "next-var" })
          .bind(focusList, { type: "vars", event: "focus-list" })
          .bind(focusDetail, { type: "vars", event: "focus-detail" })
          .hint(
            [previousVar, nextVar, focusList, focusDetail].map((spec) => displayChord(parseChord(spec))).join(""),
            "Nav"
          )
          .bind(rawDetail, { type: "vars", event: "raw-detail" }, "Raw")
          .bind(splitDetail, { type: "vars", event: "split-detail" }, "Split");
        break;
      }
      case "home":
      case "output":
        break;
    }

    return keymap;
  }
}
