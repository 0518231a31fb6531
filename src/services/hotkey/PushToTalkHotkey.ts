import {
  GlobalKeyboardListener,
  IGlobalKey,
  IGlobalKeyDownMap,
  IGlobalKeyEvent,
  IGlobalKeyListener
} from 'node-global-key-listener';
import { StructuredLogger } from '../../logging/StructuredLogger';

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  requiredModifierGroups: IGlobalKey[][];
}

interface PushToTalkCallbacks {
  onPress: () => Promise<void> | void;
  onRelease: () => Promise<void> | void;
}

export type GestureTransition = 'press' | 'release' | undefined;

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL']
};

// One physical key; usable as a trigger on its own.
const SIDED_MODIFIER_ALIASES: Record<string, IGlobalKey> = {
  rightoption: 'RIGHT ALT',
  rightalt: 'RIGHT ALT',
  leftoption: 'LEFT ALT',
  leftalt: 'LEFT ALT',
  rightcommand: 'RIGHT META',
  rightcmd: 'RIGHT META',
  leftcommand: 'LEFT META',
  leftcmd: 'LEFT META',
  rightcontrol: 'RIGHT CTRL',
  rightctrl: 'RIGHT CTRL',
  leftcontrol: 'LEFT CTRL',
  leftctrl: 'LEFT CTRL',
  rightshift: 'RIGHT SHIFT',
  leftshift: 'LEFT SHIFT'
};

const SPECIAL_KEY_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE'
};

const normalizeMainKeyToken = (token: string): IGlobalKey | undefined => {
  const trimmed = token.trim();
  if (/^[a-z]$/i.test(trimmed)) {
    return trimmed.toUpperCase() as IGlobalKey;
  }

  if (/^[0-9]$/.test(trimmed)) {
    return trimmed as IGlobalKey;
  }

  if (/^f([1-9]|1[0-9]|2[0-4])$/i.test(trimmed)) {
    return trimmed.toUpperCase() as IGlobalKey;
  }

  return undefined;
};

const isFunctionKey = (key: IGlobalKey): boolean => /^F([1-9]|1[0-9]|2[0-4])$/.test(key);

/**
 * Accepts `RightOption`, `F13`, or a modifier combination such as `Cmd+Shift+Space`.
 * A plain letter, digit or named key needs at least one modifier.
 */
export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new Error(`Hotkey is empty: '${accelerator}'`);
  }

  const modifierGroups: IGlobalKey[][] = [];
  let trigger: IGlobalKey | undefined;
  let loneCapable = false;

  for (const token of tokens) {
    const normalized = token.toLowerCase().replace(/[\s_-]/g, '');
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const sided = SIDED_MODIFIER_ALIASES[normalized];
    const special = SPECIAL_KEY_ALIASES[normalized];
    const candidate = sided ?? special ?? normalizeMainKeyToken(token);

    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new Error(`Hotkey must define exactly one trigger key: ${accelerator}`);
    }

    trigger = candidate;
    loneCapable = Boolean(sided) || isFunctionKey(candidate);
  }

  if (!trigger) {
    throw new Error(`Hotkey missing a trigger key: ${accelerator}`);
  }

  if (modifierGroups.length === 0 && !loneCapable) {
    throw new Error(`Hotkey must include at least one modifier key: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups
  };
};

export type KeyDownProbe = (key: IGlobalKey) => boolean;

/** Hold-to-talk state for one binding: press when the combo goes down, release when any part lifts. */
export class HotkeyGesture {
  private active = false;

  public constructor(private readonly hotkey: ParsedHotkey) {}

  public isActive(): boolean {
    return this.active;
  }

  public reset(): void {
    this.active = false;
  }

  public handle(keyName: string | undefined, state: 'DOWN' | 'UP', isDown: KeyDownProbe): GestureTransition {
    if (!keyName) {
      return undefined;
    }

    const isTriggerKey = keyName === this.hotkey.triggerKey;
    const modifiersHeld = this.hotkey.requiredModifierGroups.every((group) => group.some(isDown));

    if (state === 'DOWN' && isTriggerKey && modifiersHeld) {
      if (this.active) {
        return undefined;
      }

      this.active = true;
      return 'press';
    }

    if (!this.active) {
      return undefined;
    }

    if (state === 'UP' && isTriggerKey) {
      this.active = false;
      return 'release';
    }

    const comboHeld = modifiersHeld && isDown(this.hotkey.triggerKey);
    if (!comboHeld) {
      this.active = false;
      return 'release';
    }

    return undefined;
  }
}

export class PushToTalkHotkey {
  private listener: GlobalKeyboardListener | undefined;
  private readonly parsedHotkey: ParsedHotkey;
  private readonly gesture: HotkeyGesture;
  private readonly handler: IGlobalKeyListener;

  public constructor(
    accelerator: string,
    private readonly callbacks: PushToTalkCallbacks,
    private readonly logger?: StructuredLogger
  ) {
    this.parsedHotkey = parseHotkey(accelerator);
    this.gesture = new HotkeyGesture(this.parsedHotkey);

    this.handler = (event, down) => {
      return this.onKeyEvent(event, down);
    };
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public async start(): Promise<void> {
    if (this.listener) {
      return;
    }

    const listener = new GlobalKeyboardListener();
    await listener.addListener(this.handler);
    this.listener = listener;
    this.logger?.info('Push-to-talk hotkey listener started', {
      hotkey: this.describeBinding(),
      triggerKey: this.parsedHotkey.triggerKey
    });
  }

  public stop(): void {
    const listener = this.listener;
    if (!listener) {
      return;
    }

    listener.removeListener(this.handler);
    listener.kill();
    this.listener = undefined;
    this.gesture.reset();

    this.logger?.info('Push-to-talk hotkey listener stopped');
  }

  private onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    const transition = this.gesture.handle(event.name, event.state, (key) => Boolean(down[key]));

    if (transition === 'press') {
      this.invokeSafely(this.callbacks.onPress, 'onPress');
      return true;
    }

    if (transition === 'release') {
      this.invokeSafely(this.callbacks.onRelease, 'onRelease');
      return true;
    }

    return this.gesture.isActive();
  }

  private invokeSafely(fn: () => Promise<void> | void, action: 'onPress' | 'onRelease'): void {
    Promise.resolve()
      .then(fn)
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error(`Push-to-talk ${action} callback failed`, {
          detail
        });
      });
  }
}
