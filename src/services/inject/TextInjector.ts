import { StructuredLogger } from '../../logging/StructuredLogger';
import { InjectorService } from '../../core/contracts';
import { CommandRunner, runCommand } from '../process/runCommand';

export interface ClipboardAdapter {
  writeText: (text: string) => Promise<void>;
}

export class MacClipboard implements ClipboardAdapter {
  public constructor(private readonly commandRunner: CommandRunner = runCommand) {}

  public async writeText(text: string): Promise<void> {
    await this.commandRunner('pbcopy', [], { stdin: text, timeoutMs: 2000 });
  }
}

export interface TextInjectorOptions {
  clipboard: ClipboardAdapter;
  pasteDelayMs: number;
  retryCount: number;
  retryDelayMs?: number;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

const PASTE_ARGS = ['-e', 'tell application "System Events" to keystroke "v" using command down'];
const SEND_ARGS = ['-e', 'tell application "System Events" to key code 36'];

export class TextInjector implements InjectorService {
  private readonly clipboard: ClipboardAdapter;
  private readonly pasteDelayMs: number;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: TextInjectorOptions) {
    this.clipboard = options.clipboard;
    this.pasteDelayMs = options.pasteDelayMs;
    this.retryCount = Math.max(1, options.retryCount);
    this.retryDelayMs = options.retryDelayMs ?? 120;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async writeClipboard(text: string): Promise<void> {
    await this.clipboard.writeText(text);
    this.logger?.info('Clipboard updated', { length: text.length });
  }

  /** Sends Cmd+V to the frontmost application. The clipboard keeps the text afterwards. */
  public async paste(): Promise<void> {
    await sleep(this.pasteDelayMs);

    const failures: string[] = [];
    for (let attempt = 1; attempt <= this.retryCount; attempt += 1) {
      try {
        await this.commandRunner('osascript', PASTE_ARGS, { timeoutMs: 4000 });
        this.logger?.info('Paste keystroke sent', { attempt });
        return;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        failures.push(`attempt ${attempt}: ${detail}`);
        this.logger?.warn('Paste keystroke failed', { attempt, detail });
      }

      if (attempt < this.retryCount) {
        await sleep(this.retryDelayMs);
      }
    }

    throw new Error(`Paste failed after ${this.retryCount} attempts. ${failures.slice(-2).join(' | ')}`);
  }

  public async send(): Promise<void> {
    await this.commandRunner('osascript', SEND_ARGS, { timeoutMs: 4000 });
    this.logger?.info('Send keystroke sent');
  }
}
