export type KeyDefinition = {
  key: string;
  code: string;
  keyCode: number;
  /** Text inserted by the key, when it produces any. */
  text?: string;
};

export type KeyChord = {
  modifiers: number;
  modifierKeys: KeyDefinition[];
  key: KeyDefinition;
};

// Bit flags of Input.dispatchKeyEvent's `modifiers`.
export const MODIFIER_BITS: Record<string, number> = {
  Alt: 1,
  Control: 2,
  Meta: 4,
  Shift: 8
};

const NAMED_KEYS: Record<string, KeyDefinition> = {
  Enter: { key: "Enter", code: "Enter", keyCode: 13, text: "\r" },
  Tab: { key: "Tab", code: "Tab", keyCode: 9 },
  Escape: { key: "Escape", code: "Escape", keyCode: 27 },
  Backspace: { key: "Backspace", code: "Backspace", keyCode: 8 },
  Delete: { key: "Delete", code: "Delete", keyCode: 46 },
  ArrowUp: { key: "ArrowUp", code: "ArrowUp", keyCode: 38 },
  ArrowDown: { key: "ArrowDown", code: "ArrowDown", keyCode: 40 },
  ArrowLeft: { key: "ArrowLeft", code: "ArrowLeft", keyCode: 37 },
  ArrowRight: { key: "ArrowRight", code: "ArrowRight", keyCode: 39 },
  Home: { key: "Home", code: "Home", keyCode: 36 },
  End: { key: "End", code: "End", keyCode: 35 },
  PageUp: { key: "PageUp", code: "PageUp", keyCode: 33 },
  PageDown: { key: "PageDown", code: "PageDown", keyCode: 34 },
  Space: { key: " ", code: "Space", keyCode: 32, text: " " },
  Control: { key: "Control", code: "ControlLeft", keyCode: 17 },
  Shift: { key: "Shift", code: "ShiftLeft", keyCode: 16 },
  Alt: { key: "Alt", code: "AltLeft", keyCode: 18 },
  Meta: { key: "Meta", code: "MetaLeft", keyCode: 91 }
};

for (let index = 1; index <= 12; index += 1) {
  NAMED_KEYS[`F${index}`] = { key: `F${index}`, code: `F${index}`, keyCode: 111 + index };
}

const ALIASES: Record<string, string> = {
  Return: "Enter",
  Esc: "Escape",
  Up: "ArrowUp",
  Down: "ArrowDown",
  Left: "ArrowLeft",
  Right: "ArrowRight",
  Ctrl: "Control",
  Cmd: "Meta"
};

const characterKey = (char: string): KeyDefinition => {
  if (char === "\n" || char === "\r") {
    return { key: "Enter", code: "Enter", keyCode: 13, text: "\r" };
  }
  if (char === " ") {
    return { key: " ", code: "Space", keyCode: 32, text: " " };
  }
  if (/^[a-z]$/i.test(char)) {
    return { key: char, code: `Key${char.toUpperCase()}`, keyCode: char.toUpperCase().charCodeAt(0), text: char };
  }
  if (/^[0-9]$/.test(char)) {
    return { key: char, code: `Digit${char}`, keyCode: char.charCodeAt(0), text: char };
  }
  return { key: char, code: "", keyCode: 0, text: char };
};

/** Looks up a named key ("Enter", "F5", "Esc") or treats a single character as a text key. */
export function resolveKey(name: string): KeyDefinition | null {
  const named = NAMED_KEYS[ALIASES[name] ?? name];
  if (named) return named;
  if ([...name].length === 1) return characterKey(name);
  return null;
}

/** Key definition for one character of typed text. */
export function keyForCharacter(char: string): KeyDefinition {
  return characterKey(char);
}

/** Parses chords such as `Control+a` or `Shift+Tab`. Returns null for unknown keys. */
export function parseChord(description: string): KeyChord | null {
  const parts = description === "+" ? ["+"] : description.split("+");
  const last = parts.pop();
  if (typeof last !== "string" || last === "") return null;

  let modifiers = 0;
  const modifierKeys: KeyDefinition[] = [];
  for (const part of parts) {
    const name = ALIASES[part] ?? part;
    const bit = MODIFIER_BITS[name];
    const definition = NAMED_KEYS[name];
    if (!bit || !definition) return null;
    modifiers |= bit;
    modifierKeys.push(definition);
  }

  const key = resolveKey(last);
  if (!key) return null;
  return { modifiers, modifierKeys, key };
}
