import { DictationController } from '../core/DictationController';
import { Notifier } from '../services/notify/Notifier';
import { ClipboardFallbackReason } from '../types';

const PREVIEW_LENGTH = 100;

const FALLBACK_MESSAGES: Record<ClipboardFallbackReason, string> = {
  'focus-moved-within-app': 'You switched windows while recording. Text is in the clipboard; paste it with Cmd+V.',
  'focus-unknown': 'Could not confirm where to paste. Text is in the clipboard; paste it with Cmd+V.',
  'paste-failed':
    'Paste failed. Grant Accessibility permission to your terminal in System Settings > Privacy & Security. Text is in the clipboard.'
};

const preview = (text: string): string =>
  text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH - 3)}...` : text;

/** Maps controller events onto desktop notifications. */
export class StatusNotifier {
  public constructor(
    private readonly app: DictationController,
    private readonly notifier: Notifier
  ) {
    this.app.on('stateChanged', (state) => {
      if (state.stage === 'error' && state.detail) {
        this.show('Murmur error', state.detail);
      }
    });

    this.app.on('recordingTooShort', () => {
      this.show('Murmur', 'Recording too short');
    });

    this.app.on('noSpeechDetected', () => {
      this.show('Murmur', 'No speech detected');
    });

    this.app.on('transcriptionFailed', (reason) => {
      this.show('Murmur', `Transcription failed: ${reason}`);
    });

    this.app.on('deliveryFailed', (reason) => {
      this.show('Murmur', `Could not deliver text: ${reason}`);
    });

    this.app.on('clipboardFallback', (reason) => {
      this.show('Murmur', FALLBACK_MESSAGES[reason]);
    });

    this.app.on('jobDelivered', (report) => {
      if (report.action === 'clipboardOnly') {
        return;
      }

      this.show('Dictation complete', preview(report.text));
    });
  }

  private show(title: string, body: string): void {
    void this.notifier.notify(title, body);
  }
}
