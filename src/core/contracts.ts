import { FocusSnapshot, TranscriptRecord } from '../types';

export interface WarmableService {
  warmup?: () => Promise<void>;
  shutdown?: () => Promise<void>;
}

export interface Transcriber extends WarmableService {
  transcribe: (samples16k: Float32Array, language?: string) => Promise<string>;
}

export interface LiveFocus {
  handle?: string;
  pid?: number;
  windowId?: number;
  title?: string;
  appName?: string;
}

export interface FocusProbe {
  /** Resolves undefined when the query could not be answered. */
  query: () => Promise<LiveFocus | undefined>;
  activate: (snapshot: FocusSnapshot) => Promise<void>;
}

export interface InjectorService {
  writeClipboard: (text: string) => Promise<void>;
  paste: () => Promise<void>;
  send: () => Promise<void>;
}

export interface TranscriptRepository {
  save: (text: string, timestamp?: Date) => Promise<string>;
  loadRecent: (limit: number) => Promise<TranscriptRecord[]>;
  count: () => Promise<number>;
}

export class TranscriptionFailedError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscriptionFailedError';
  }
}
