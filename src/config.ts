import os from 'node:os';
import path from 'node:path';
import { isLogLevel, LogLevel } from './logging/StructuredLogger';
import { AppConfig } from './types';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const parseLogLevelOrDefault = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
};

const parseArgs = (value: string | undefined): string[] | undefined => {
  if (value === undefined) {
    return undefined;
  }

  return value
    .split(/\s+/)
    .map((token) => token.trim())
    .filter(Boolean);
};

const resolveLanguage = (value: string | undefined): string | undefined => {
  if (value === undefined) {
    return 'en';
  }

  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

const expandHome = (value: string): string => {
  if (value === '~') {
    return os.homedir();
  }

  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }

  return value;
};

export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');
  const asrModelPath = expandHome(
    env.MURMUR_ASR_MODEL_PATH ?? path.join(rootDir, 'models', 'ggml-large-v3-turbo.bin')
  );
  const asrCommand = env.MURMUR_ASR_COMMAND ?? path.join(rootDir, 'bin', 'murmur-asr-worker');

  return {
    hotkey: env.MURMUR_HOTKEY ?? 'RightOption',
    ffmpegInputDevice: env.MURMUR_FFMPEG_INPUT ?? ':0',
    captureSampleRate: parseIntOrDefault(env.MURMUR_CAPTURE_SAMPLE_RATE, 48000),
    chunkDurationSeconds: parseFloatOrDefault(env.MURMUR_CHUNK_SECONDS, 5),
    overlapDurationSeconds: parseFloatOrDefault(env.MURMUR_OVERLAP_SECONDS, 1.5),
    minRecordSeconds: parseFloatOrDefault(env.MURMUR_MIN_RECORD_SECONDS, 0.3),
    language: resolveLanguage(env.MURMUR_LANGUAGE),
    asrCommand,
    asrArgs: parseArgs(env.MURMUR_ASR_ARGS) ?? ['--model', asrModelPath, '--serve'],
    asrModelPath,
    asrTimeoutMs: parseIntOrDefault(env.MURMUR_ASR_TIMEOUT_MS, 120000),
    pasteDelayMs: parseIntOrDefault(env.MURMUR_PASTE_DELAY_MS, 100),
    pasteRetryCount: parseIntOrDefault(env.MURMUR_PASTE_RETRY_COUNT, 2),
    restoreSettleMs: parseIntOrDefault(env.MURMUR_RESTORE_SETTLE_MS, 150),
    autoSend: parseBoolOrDefault(env.MURMUR_AUTO_SEND, false),
    transcriptsDir: expandHome(env.MURMUR_TRANSCRIPTS_DIR ?? '~/.murmur_transcripts'),
    logDir: expandHome(env.MURMUR_LOG_DIR ?? '~/.murmur/logs'),
    logLevel: parseLogLevelOrDefault(env.MURMUR_LOG_LEVEL, 'info'),
    recentLimit: parseIntOrDefault(env.MURMUR_RECENT_LIMIT, 5),
    notifications: parseBoolOrDefault(env.MURMUR_NOTIFICATIONS, true)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.hotkey.trim()) {
    errors.push('MURMUR_HOTKEY must not be empty.');
  }

  if (!config.ffmpegInputDevice.trim()) {
    errors.push('MURMUR_FFMPEG_INPUT must not be empty.');
  }

  if (config.captureSampleRate < 8000 || config.captureSampleRate > 192000) {
    errors.push('MURMUR_CAPTURE_SAMPLE_RATE must be between 8000 and 192000 Hz.');
  }

  if (config.chunkDurationSeconds < 1 || config.chunkDurationSeconds > 30) {
    errors.push('MURMUR_CHUNK_SECONDS must be between 1 and 30 seconds.');
  }

  if (config.overlapDurationSeconds < 0 || config.overlapDurationSeconds >= config.chunkDurationSeconds) {
    errors.push('MURMUR_OVERLAP_SECONDS must be at least 0 and shorter than MURMUR_CHUNK_SECONDS.');
  }

  if (config.minRecordSeconds < 0 || config.minRecordSeconds > 5) {
    errors.push('MURMUR_MIN_RECORD_SECONDS must be between 0 and 5 seconds.');
  }

  if (config.language !== undefined && !/^[a-z]{2,3}$/i.test(config.language)) {
    errors.push('MURMUR_LANGUAGE must be a 2-3 letter language code, or empty for auto-detect.');
  }

  if (!config.asrCommand.trim()) {
    errors.push('MURMUR_ASR_COMMAND must not be empty.');
  }

  if (config.asrTimeoutMs < 1000 || config.asrTimeoutMs > 600000) {
    errors.push('MURMUR_ASR_TIMEOUT_MS must be between 1000 and 600000 milliseconds.');
  }

  if (config.pasteDelayMs < 0 || config.pasteDelayMs > 2000) {
    errors.push('MURMUR_PASTE_DELAY_MS must be between 0 and 2000 milliseconds.');
  }

  if (config.pasteRetryCount < 1 || config.pasteRetryCount > 8) {
    errors.push('MURMUR_PASTE_RETRY_COUNT must be between 1 and 8.');
  }

  if (config.restoreSettleMs < 0 || config.restoreSettleMs > 5000) {
    errors.push('MURMUR_RESTORE_SETTLE_MS must be between 0 and 5000 milliseconds.');
  }

  if (!config.transcriptsDir.trim()) {
    errors.push('MURMUR_TRANSCRIPTS_DIR must not be empty.');
  }

  if (!config.logDir.trim()) {
    errors.push('MURMUR_LOG_DIR must not be empty.');
  }

  if (config.recentLimit < 1 || config.recentLimit > 50) {
    errors.push('MURMUR_RECENT_LIMIT must be between 1 and 50.');
  }

  return errors;
};
