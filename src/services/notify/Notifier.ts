import { StructuredLogger } from '../../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../process/runCommand';

export interface Notifier {
  notify: (title: string, body: string) => Promise<void>;
}

export const notificationArgs = (title: string, body: string): string[] => [
  '-e',
  'on run argv',
  '-e',
  'display notification (item 2 of argv) with title (item 1 of argv)',
  '-e',
  'end run',
  title,
  body
];

export class MacNotifier implements Notifier {
  public constructor(
    private readonly enabled: boolean,
    private readonly commandRunner: CommandRunner = runCommand,
    private readonly logger?: StructuredLogger
  ) {}

  /** Best effort: a notification that cannot be shown is logged and dropped. */
  public async notify(title: string, body: string): Promise<void> {
    if (!this.enabled) {
      return;
    }

    try {
      await this.commandRunner('osascript', notificationArgs(title, body), { timeoutMs: 3000 });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.debug('Notification failed', { title, detail });
    }
  }
}
