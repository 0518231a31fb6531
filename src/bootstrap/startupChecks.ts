import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

const assertPathExists = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Update your MURMUR_* environment settings.`);
  }
};

const assertExecutable = (absolutePath: string, label: string): void => {
  try {
    fs.accessSync(absolutePath, fsConstants.X_OK);
  } catch {
    throw new Error(`${label} at '${absolutePath}' is not executable.`);
  }
};

const ensureWritableDirectory = (directory: string, label: string): void => {
  fs.mkdirSync(directory, { recursive: true });

  try {
    fs.accessSync(directory, fsConstants.W_OK);
  } catch {
    throw new Error(`${label} '${directory}' is not writable.`);
  }
};

export type StartupCheckConfig = Pick<AppConfig, 'asrCommand' | 'asrModelPath' | 'transcriptsDir'>;

export const runStartupChecks = async (
  config: StartupCheckConfig,
  logger: StructuredLogger,
  commandRunner: CommandRunner = runCommand
): Promise<void> => {
  logger.info('Running startup checks');

  // A bare command name is resolved through PATH by spawn.
  if (config.asrCommand.includes(path.sep)) {
    const workerPath = path.resolve(config.asrCommand);
    assertPathExists(workerPath, 'ASR worker');
    assertExecutable(workerPath, 'ASR worker');
  }

  if (config.asrModelPath && !fs.existsSync(config.asrModelPath)) {
    logger.warn('ASR model path not found; the worker may fail to load it', {
      modelPath: config.asrModelPath
    });
  }

  await commandRunner('ffmpeg', ['-version'], { timeoutMs: 8000 });
  await commandRunner('osascript', ['-e', 'return "ok"'], { timeoutMs: 8000 });

  ensureWritableDirectory(config.transcriptsDir, 'Transcript directory');

  logger.info('Startup checks completed successfully');
};
