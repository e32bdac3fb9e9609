import { HotkeyMonitorError, describeError } from "../errors";
import { type Logger, silentLogger } from "../logging/logger";
import type { AudioClip, IAudioCapture, RecordingState } from "../types/contracts";
import type { KeyEvent, KeyEventSource } from "./globalKeySource";

export interface HotkeyMonitorOptions {
  /** Key name as reported by the key source, e.g. "RIGHT CTRL". */
  hotkey: string;
  source: KeyEventSource;
  audioCapture: IAudioCapture;
  /** Receives the finished clip, or undefined for a capture too short to use. */
  onClip: (clip: AudioClip | undefined) => Promise<unknown>;
  logger?: Logger;
}

/**
 * Push-to-talk state machine.
 *
 *   idle --press--> recording --release--> flushing --cycle settled--> idle
 *
 * A press while recording is key auto-repeat and is ignored. A press while
 * flushing means the previous clip is still being transcribed; it is rejected
 * so the microphone is never opened twice. Releases outside recording are
 * ignored.
 */
export class HotkeyMonitor {
  private state: RecordingState = "idle";
  private starting?: Promise<boolean>;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly hotkey: string;
  private readonly logger: Logger;

  constructor(private readonly options: HotkeyMonitorOptions) {
    this.hotkey = options.hotkey.toUpperCase();
    this.logger = options.logger ?? silentLogger;
  }

  getState(): RecordingState {
    return this.state;
  }

  async start(): Promise<void> {
    try {
      await this.options.source.start((event) => this.handleKeyEvent(event));
    } catch (error) {
      throw new HotkeyMonitorError(
        `Global key listener could not be started: ${describeError(error)}`,
        error
      );
    }
    this.logger.info(`Hold '${this.hotkey}' to dictate.`);
  }

  stop(): void {
    this.options.source.stop();
    if (this.state === "recording") {
      this.options.audioCapture.abort();
      this.starting = undefined;
      this.state = "idle";
    }
  }

  /** Resolves once every press/release already received has been fully handled. */
  async whenSettled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  handleKeyEvent(event: KeyEvent): void {
    if (event.name?.toUpperCase() !== this.hotkey) {
      return;
    }
    this.track(event.state === "DOWN" ? this.onPress() : this.onRelease());
  }

  private track(work: Promise<void>): void {
    this.inFlight.add(work);
    void work.finally(() => this.inFlight.delete(work));
  }

  private async onPress(): Promise<void> {
    if (this.state === "recording") {
      return;
    }
    if (this.state === "flushing") {
      this.logger.warn("Previous dictation is still being processed; press ignored.");
      return;
    }

    this.state = "recording";
    const starting = this.options.audioCapture.start().then(
      () => true,
      (error: unknown) => {
        // After stop() the failure is the abort itself.
        if (this.state === "recording") {
          this.logger.error(`Could not start recording: ${describeError(error)}`);
        }
        return false;
      }
    );
    this.starting = starting;

    const started = await starting;
    if (!started && this.state === "recording") {
      this.starting = undefined;
      this.state = "idle";
    }
  }

  private async onRelease(): Promise<void> {
    if (this.state !== "recording") {
      return;
    }
    this.state = "flushing";

    try {
      const started = (await this.starting) ?? false;
      this.starting = undefined;
      if (!started) {
        return;
      }

      let clip: AudioClip | undefined;
      try {
        clip = await this.options.audioCapture.stop();
      } catch (error) {
        this.logger.error(`Recording failed: ${describeError(error)}`);
        return;
      }

      await this.options.onClip(clip);
    } catch (error) {
      this.logger.error(`Dictation cycle failed: ${describeError(error)}`);
    } finally {
      this.state = "idle";
    }
  }
}
