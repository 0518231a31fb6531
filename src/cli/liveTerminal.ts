import readline from 'node:readline';
import { resolveConfig, validateConfig } from '../config';
import { FocusProbe } from '../core/contracts';
import { DictationController } from '../core/DictationController';
import { StructuredLogger } from '../logging/StructuredLogger';
import { WorkerTranscriber } from '../services/asr/WorkerTranscriber';
import { FfmpegRecorder } from '../services/capture/FfmpegRecorder';
import { FocusTracker } from '../services/focus/FocusTracker';
import { TranscriptStore } from '../services/store/TranscriptStore';
import { TranscriptRecord } from '../types';
import { formatRecent, formatStatus, HELP_TEXT, parseTerminalCommand, TerminalInjector } from './terminalCommands';

// The terminal is always the delivery target, so focus never moves.
const terminalFocus: FocusProbe = {
  query: async () => ({ pid: process.pid, appName: 'terminal' }),
  activate: async () => undefined
};

const print = (text: string): void => {
  process.stdout.write(`${text}\n`);
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, { console: false, minLevel: config.logLevel });
  const injector = new TerminalInjector();

  const app = new DictationController(
    {
      recorder: new FfmpegRecorder(config.ffmpegInputDevice, config.captureSampleRate, logger.child({ component: 'capture' })),
      transcriber: new WorkerTranscriber(config, logger.child({ component: 'asr' })),
      focus: new FocusTracker(terminalFocus, logger),
      injector,
      store: new TranscriptStore(config.transcriptsDir)
    },
    logger,
    {
      chunkDurationSeconds: config.chunkDurationSeconds,
      overlapDurationSeconds: config.overlapDurationSeconds,
      minRecordSeconds: config.minRecordSeconds,
      language: config.language,
      autoSend: false,
      restoreSettleMs: 0
    }
  );

  let lastRecent: TranscriptRecord[] = [];
  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain
      .then(fn)
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`\n[error] ${detail}\n`);
      });
  };

  app.on('stateChanged', (state) => {
    if (state.stage === 'error' && state.detail) {
      process.stderr.write(`\n[state:error] ${state.detail}\n`);
      return;
    }

    if (state.stage === 'recording') {
      print('\n[listening]');
    }
  });

  app.on('liveTextUpdated', (text) => {
    print(`[live] ${text}`);
  });

  app.on('queueDepthChanged', (depth) => {
    if (depth > 1) {
      print(`[queue] ${depth} recordings pending`);
    }
  });

  app.on('recordingTooShort', (durationSeconds) => {
    print(`[notice] Recording too short (${durationSeconds.toFixed(2)}s)`);
  });

  app.on('noSpeechDetected', () => {
    print('[notice] No speech detected');
  });

  app.on('transcriptionFailed', (reason) => {
    print(`[notice] Transcription failed: ${reason}`);
  });

  app.on('deliveryFailed', (reason) => {
    print(`[notice] Delivery failed: ${reason}`);
  });

  app.on('jobDelivered', (report) => {
    if (report.savedPath) {
      print(`[saved] ${report.savedPath}`);
    }
  });

  print('Warming up ASR worker...');
  await app.warmup();
  print('Ready.');
  print(`ASR worker: ${config.asrCommand}`);
  print(`Transcripts: ${config.transcriptsDir}`);
  print(`Log: ${logger.getLogPath()}`);
  print(HELP_TEXT);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    if (app.isRecording()) {
      await app.handlePushToTalkReleased();
    }
    await app.shutdown();
    await logger.flush();
    rl.close();
    print('\nBye.');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    queue(shutdown);
  });

  rl.on('line', (line) => {
    const command = parseTerminalCommand(line);

    switch (command.kind) {
      case 'quit':
        queue(shutdown);
        return;
      case 'help':
        print(HELP_TEXT);
        return;
      case 'status':
        print(formatStatus(app.getState()));
        return;
      case 'invalid':
        print(command.message);
        return;
      case 'recent':
        queue(async () => {
          lastRecent = await app.recentTranscripts(config.recentLimit);
          print(formatRecent(lastRecent));
        });
        return;
      case 'copy':
        queue(async () => {
          if (lastRecent.length === 0) {
            lastRecent = await app.recentTranscripts(config.recentLimit);
          }

          const record = lastRecent[command.index - 1];
          if (!record) {
            print(`[copy] no transcript #${command.index}; run /recent first`);
            return;
          }

          await app.copyTranscript(record.text);
          print(`[copy] #${command.index}: ${injector.getClipboardText()}`);
        });
        return;
      case 'toggle':
        queue(async () => {
          if (!app.isRecording()) {
            print('\n[start]');
            await app.handlePushToTalkPressed();
          } else {
            print('\n[stop]');
            await app.handlePushToTalkReleased();
          }
        });
        return;
    }
  });
};

main().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
