#!/usr/bin/env node
import * as dotenv from "dotenv";
import { AudioCaptureService } from "./audio/audioCaptureService";
import { type DictationSettings, readSettings } from "./config/settings";
import { describeError } from "./errors";
import { GlobalKeySource } from "./hotkey/globalKeySource";
import { HotkeyMonitor } from "./hotkey/hotkeyMonitor";
import { KeyboardTextInjector } from "./inject/keyboardTextInjector";
import { createConsoleLogger } from "./logging/logger";
import { DictationOrchestrator } from "./orchestration/dictationOrchestrator";
import { HttpTranscriptionClient } from "./stt/httpTranscriptionClient";

export async function main(args: readonly string[] = process.argv.slice(2)): Promise<number> {
  dotenv.config();

  let settings: Readonly<DictationSettings>;
  try {
    settings = readSettings(process.env, args);
  } catch (error) {
    createConsoleLogger("error").error(describeError(error));
    return 1;
  }

  const logger = createConsoleLogger(settings.logLevel);

  const audioCapture = new AudioCaptureService({
    sampleRateHz: settings.sampleRateHz,
    channels: settings.channels,
    minDurationMs: settings.minRecordingMs,
    recorder: settings.recorder,
    logger: logger.scoped("audio")
  });

  const orchestrator = new DictationOrchestrator({
    settings,
    transcriber: new HttpTranscriptionClient({
      baseUrl: settings.baseUrl,
      apiKey: settings.apiKey,
      timeoutMs: settings.timeoutMs
    }),
    inputInjector: new KeyboardTextInjector(settings.insertTrailingSpace),
    logger: logger.scoped("dictation")
  });

  const monitor = new HotkeyMonitor({
    hotkey: settings.hotkey,
    source: new GlobalKeySource(),
    audioCapture,
    onClip: (clip) => orchestrator.processClip(clip),
    logger: logger.scoped("hotkey")
  });

  try {
    await monitor.start();
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }

  logger.info(`Ready to transcribe with ${settings.model} (Ctrl+C to quit).`);
  const signal = await waitForShutdownSignal();
  logger.info(`Exiting on ${signal}.`);
  monitor.stop();
  return 0;
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(`[error] ${describeError(error)}`);
      process.exit(1);
    }
  );
}
