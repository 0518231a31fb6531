import { LogLevel } from './logging/StructuredLogger';

export type PipelineStage = 'idle' | 'starting' | 'recording' | 'error';

export interface AppState {
  stage: PipelineStage;
  detail?: string;
  queueDepth: number;
}

export interface FocusSnapshot {
  /** Bundle identifier of the focused application, used to re-activate it. */
  handle?: string;
  pid?: number;
  windowId?: number;
  title?: string;
  appName?: string;
  capturedAt: number;
}

export type FocusComparison = 'same' | 'differentWindowSameApp' | 'differentApp';

export type DeliveryAction = 'paste' | 'restoreAndPaste' | 'clipboardOnly';

export interface TranscriptionJob {
  id: number;
  samples: Float32Array;
  sampleRate: number;
  accumulatedText: string;
  focus: FocusSnapshot;
  durationSeconds: number;
  enqueuedAt: number;
}

export type ClipboardFallbackReason = 'focus-moved-within-app' | 'focus-unknown' | 'paste-failed';

export type DeliveryDecision =
  | { action: 'paste' }
  | { action: 'restoreAndPaste' }
  | { action: 'clipboardOnly'; reason: Exclude<ClipboardFallbackReason, 'paste-failed'> };

export type JobOutcome =
  | {
      kind: 'delivered';
      text: string;
      action: Exclude<DeliveryAction, 'clipboardOnly'>;
      savedPath?: string;
    }
  | {
      kind: 'clipboardOnly';
      text: string;
      reason: ClipboardFallbackReason;
      savedPath?: string;
    }
  | { kind: 'noSpeech' }
  | { kind: 'transcriptionFailed'; reason: string }
  | { kind: 'deliveryFailed'; text: string; reason: string };

export interface DeliveryReport {
  jobId: number;
  text: string;
  action: DeliveryAction;
  savedPath?: string;
}

export type StopOutcome =
  | { kind: 'ignored' }
  | { kind: 'captureEmpty' }
  | { kind: 'tooShort'; durationSeconds: number }
  | { kind: 'queued'; jobId: number; queueDepth: number };

export interface TranscriptRecord {
  timestamp: string;
  text: string;
  path: string;
}

export interface AppConfig {
  hotkey: string;
  ffmpegInputDevice: string;
  captureSampleRate: number;
  chunkDurationSeconds: number;
  overlapDurationSeconds: number;
  minRecordSeconds: number;
  language?: string;
  asrCommand: string;
  asrArgs: string[];
  asrModelPath: string;
  asrTimeoutMs: number;
  pasteDelayMs: number;
  pasteRetryCount: number;
  restoreSettleMs: number;
  autoSend: boolean;
  transcriptsDir: string;
  logDir: string;
  logLevel: LogLevel;
  recentLimit: number;
  notifications: boolean;
}
