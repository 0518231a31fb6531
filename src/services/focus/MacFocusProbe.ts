import { FocusProbe, LiveFocus } from '../../core/contracts';
import { FocusSnapshot } from '../../types';
import { CommandRunner, runCommand } from '../process/runCommand';

// Frontmost application plus its top layer-0 on-screen window, as JSON.
const FOCUS_QUERY_JXA = [
  "ObjC.import('AppKit');",
  "ObjC.import('CoreGraphics');",
  'function run() {',
  '  const app = $.NSWorkspace.sharedWorkspace.frontmostApplication;',
  '  const pid = app.processIdentifier;',
  '  const options = $.kCGWindowListOptionOnScreenOnly | $.kCGWindowListExcludeDesktopElements;',
  '  const windows = ObjC.deepUnwrap(ObjC.castRefToObject($.CGWindowListCopyWindowInfo(options, $.kCGNullWindowID))) || [];',
  '  const front = windows.find((w) => w.kCGWindowOwnerPID === pid && w.kCGWindowLayer === 0);',
  '  return JSON.stringify({',
  '    pid: pid,',
  '    handle: ObjC.unwrap(app.bundleIdentifier),',
  '    appName: ObjC.unwrap(app.localizedName),',
  '    windowId: front ? front.kCGWindowNumber : null,',
  "    title: front ? (front.kCGWindowName || '') : null",
  '  });',
  '}'
].join('\n');

export const osascriptArgsForRestore = (handle: string, title: string): string[] => [
  '-e',
  'on run argv',
  '-e',
  'set targetId to item 1 of argv',
  '-e',
  'set targetTitle to item 2 of argv',
  '-e',
  'tell application id targetId to activate',
  '-e',
  'if targetTitle is not "" then',
  '-e',
  'tell application "System Events"',
  '-e',
  'tell (first application process whose bundle identifier is targetId)',
  '-e',
  'try',
  '-e',
  'perform action "AXRaise" of (first window whose name is targetTitle)',
  '-e',
  'end try',
  '-e',
  'end tell',
  '-e',
  'end tell',
  '-e',
  'end if',
  '-e',
  'end run',
  handle,
  title
];

const pickString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
};

const pickNumber = (record: Record<string, unknown>, key: string): number | undefined => {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseFocusQueryOutput = (stdout: string): LiveFocus | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout.trim());
  } catch {
    return undefined;
  }

  if (!isRecord(parsed)) {
    return undefined;
  }

  const pid = pickNumber(parsed, 'pid');
  if (pid === undefined) {
    return undefined;
  }

  return {
    pid,
    handle: pickString(parsed, 'handle'),
    appName: pickString(parsed, 'appName'),
    windowId: pickNumber(parsed, 'windowId'),
    title: pickString(parsed, 'title')
  };
};

export class MacFocusProbe implements FocusProbe {
  public constructor(
    private readonly commandRunner: CommandRunner = runCommand,
    private readonly timeoutMs = 2000
  ) {}

  public async query(): Promise<LiveFocus | undefined> {
    const { stdout } = await this.commandRunner('osascript', ['-l', 'JavaScript', '-e', FOCUS_QUERY_JXA], {
      timeoutMs: this.timeoutMs
    });
    return parseFocusQueryOutput(stdout);
  }

  public async activate(snapshot: FocusSnapshot): Promise<void> {
    if (!snapshot.handle) {
      throw new Error('Focus snapshot has no application handle to activate');
    }

    await this.commandRunner('osascript', osascriptArgsForRestore(snapshot.handle, snapshot.title ?? ''), {
      timeoutMs: this.timeoutMs * 2
    });
  }
}
