import { InjectorService } from '../core/contracts';
import { AppState, TranscriptRecord } from '../types';

export type TerminalCommand =
  | { kind: 'toggle' }
  | { kind: 'status' }
  | { kind: 'recent' }
  | { kind: 'copy'; index: number }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'invalid'; message: string };

export const parseTerminalCommand = (line: string): TerminalCommand => {
  const input = line.trim();

  if (input === '') {
    return { kind: 'toggle' };
  }

  if (input === '/status') {
    return { kind: 'status' };
  }

  if (input === '/recent') {
    return { kind: 'recent' };
  }

  if (input === '/help') {
    return { kind: 'help' };
  }

  if (input === '/quit') {
    return { kind: 'quit' };
  }

  if (input === '/copy' || input.startsWith('/copy ')) {
    const argument = input.slice('/copy'.length).trim();
    if (!/^[1-9][0-9]*$/.test(argument)) {
      return { kind: 'invalid', message: 'Usage: /copy <n>, where n is a number from /recent.' };
    }

    return { kind: 'copy', index: Number(argument) };
  }

  return { kind: 'invalid', message: 'Unknown command. Use /help, /status, /recent, /copy <n>, or /quit.' };
};

export const HELP_TEXT = [
  '',
  'Commands:',
  '  <enter>             Start/stop dictation',
  '  /status             Print current state',
  '  /recent             List recent transcripts',
  '  /copy <n>           Copy transcript n from /recent to the clipboard',
  '  /help               Show this help',
  '  /quit               Exit',
  ''
].join('\n');

export const formatStatus = (state: AppState): string =>
  `[status] stage=${state.stage} queue=${state.queueDepth}${state.detail ? ` detail=${state.detail}` : ''}`;

export const formatRecent = (records: TranscriptRecord[]): string => {
  if (records.length === 0) {
    return '[recent] no transcripts yet';
  }

  return records
    .map((record, index) => {
      const oneLine = record.text.replace(/\s+/g, ' ').trim();
      const preview = oneLine.length > 60 ? `${oneLine.slice(0, 57)}...` : oneLine;
      return `  ${index + 1}. ${record.timestamp}  ${preview}`;
    })
    .join('\n');
};

/** Prints delivered text instead of pasting it; the "clipboard" is the last text it was handed. */
export class TerminalInjector implements InjectorService {
  private clipboardText = '';

  public constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  public getClipboardText(): string {
    return this.clipboardText;
  }

  public async writeClipboard(text: string): Promise<void> {
    this.clipboardText = text;
  }

  public async paste(): Promise<void> {
    this.write(`\n[delivered] ${this.clipboardText}\n`);
  }

  public async send(): Promise<void> {
    this.write('[send]\n');
  }
}
