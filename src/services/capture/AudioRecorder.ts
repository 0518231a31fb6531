export interface RealtimeStreamOptions {
  onSamples: (samples: Float32Array, sampleRate: number) => void;
  /** Capture ended without `stop()` being called. */
  onError?: (error: Error) => void;
}

export interface AudioRecorder {
  readonly sampleRate: number;
  isRecording(): boolean;
  startStreaming(options: RealtimeStreamOptions): Promise<void>;
  stop(): Promise<void>;
}
