import { resolveConfig, validateConfig } from './config';
import { runStartupChecks } from './bootstrap/startupChecks';
import { DictationController } from './core/DictationController';
import { StructuredLogger } from './logging/StructuredLogger';
import { WorkerTranscriber } from './services/asr/WorkerTranscriber';
import { FfmpegRecorder } from './services/capture/FfmpegRecorder';
import { FocusTracker } from './services/focus/FocusTracker';
import { MacFocusProbe } from './services/focus/MacFocusProbe';
import { PushToTalkHotkey } from './services/hotkey/PushToTalkHotkey';
import { MacClipboard, TextInjector } from './services/inject/TextInjector';
import { MacNotifier } from './services/notify/Notifier';
import { runCommand } from './services/process/runCommand';
import { TranscriptStore } from './services/store/TranscriptStore';
import { StatusNotifier } from './ui/StatusNotifier';

let hotkeyHandler: PushToTalkHotkey | undefined;
let orchestrator: DictationController | undefined;
let logger: StructuredLogger | undefined;
let shuttingDown = false;

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid Murmur configuration:\n- ${configErrors.join('\n- ')}`);
  }

  logger = await StructuredLogger.create(config.logDir, { minLevel: config.logLevel });
  logger.info('Murmur bootstrap started', {
    logPath: logger.getLogPath(),
    hotkey: config.hotkey,
    language: config.language ?? 'auto'
  });

  const notifier = new MacNotifier(config.notifications, runCommand, logger.child({ component: 'notify' }));

  orchestrator = new DictationController(
    {
      recorder: new FfmpegRecorder(config.ffmpegInputDevice, config.captureSampleRate, logger.child({ component: 'capture' })),
      transcriber: new WorkerTranscriber(config, logger.child({ component: 'asr' })),
      focus: new FocusTracker(new MacFocusProbe(), logger.child({ component: 'focus' })),
      injector: new TextInjector({
        clipboard: new MacClipboard(),
        pasteDelayMs: config.pasteDelayMs,
        retryCount: config.pasteRetryCount,
        logger: logger.child({ component: 'inject' })
      }),
      store: new TranscriptStore(config.transcriptsDir)
    },
    logger,
    {
      chunkDurationSeconds: config.chunkDurationSeconds,
      overlapDurationSeconds: config.overlapDurationSeconds,
      minRecordSeconds: config.minRecordSeconds,
      language: config.language,
      autoSend: config.autoSend,
      restoreSettleMs: config.restoreSettleMs
    }
  );

  new StatusNotifier(orchestrator, notifier);

  hotkeyHandler = new PushToTalkHotkey(
    config.hotkey,
    {
      onPress: async () => {
        await orchestrator?.handlePushToTalkPressed();
      },
      onRelease: async () => {
        await orchestrator?.handlePushToTalkReleased();
      }
    },
    logger.child({ component: 'hotkey' })
  );

  await runStartupChecks(config, logger);
  await orchestrator.warmup();
  await hotkeyHandler.start();

  logger.info('Murmur ready', { hotkey: hotkeyHandler.describeBinding() });
};

const shutdown = async (): Promise<void> => {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  hotkeyHandler?.stop();
  await orchestrator?.shutdown();
  await logger?.flush();
};

const exitAfterShutdown = (): void => {
  shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[Murmur] Shutdown failed: ${detail}`);
      process.exit(1);
    });
};

process.on('SIGINT', exitAfterShutdown);
process.on('SIGTERM', exitAfterShutdown);

bootstrap().catch(async (error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  logger?.error('Fatal bootstrap failure', { detail });
  console.error(`[Murmur] Startup error: ${detail}`);

  await shutdown().catch((shutdownError: unknown) => {
    const shutdownDetail = shutdownError instanceof Error ? shutdownError.message : String(shutdownError);
    console.error(`[Murmur] Shutdown failed: ${shutdownDetail}`);
  });
  process.exit(1);
});
