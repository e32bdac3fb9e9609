import type { DictationSettings } from "../config/settings";
import { EmptyResultError, describeError } from "../errors";
import { type Logger, silentLogger } from "../logging/logger";
import { DEFAULT_COMMAND_RULES } from "../rewrite/commandRules";
import { rewrite } from "../rewrite/punctuationRewriter";
import type {
  AudioClip,
  CommandRule,
  CycleOutcome,
  ITextInjector,
  ITranscriber
} from "../types/contracts";

interface Dependencies {
  settings: Pick<DictationSettings, "model" | "prompt">;
  transcriber: ITranscriber;
  inputInjector: ITextInjector;
  rules?: readonly CommandRule[];
  logger?: Logger;
}

/** Runs one clip through transcribe, rewrite and type. Never throws. */
export class DictationOrchestrator {
  private readonly logger: Logger;
  private readonly rules: readonly CommandRule[];

  constructor(private readonly deps: Dependencies) {
    this.logger = deps.logger ?? silentLogger;
    this.rules = deps.rules ?? DEFAULT_COMMAND_RULES;
  }

  async processClip(clip: AudioClip | undefined): Promise<CycleOutcome> {
    if (!clip) {
      this.logger.info("No audio recorded.");
      return "skipped";
    }

    try {
      this.logger.info("Transcribing...");
      const t0 = Date.now();
      const raw = await this.deps.transcriber.transcribe(
        clip,
        this.deps.settings.prompt,
        this.deps.settings.model
      );
      const sttMs = Date.now() - t0;

      const finalText = rewrite(raw.text, this.rules);
      this.logger.debug(`Transcript: ${JSON.stringify(raw.text)} -> ${JSON.stringify(finalText)}`);

      await this.deps.inputInjector.insert(finalText);
      this.logger.info(
        `Done (rec ${(clip.durationMs / 1000).toFixed(1)}s + stt ${(sttMs / 1000).toFixed(1)}s)`
      );
      return "typed";
    } catch (error) {
      if (error instanceof EmptyResultError) {
        this.logger.info(`Nothing to type: ${error.message}`);
        return "empty";
      }
      this.logger.error(`Dictation failed: ${describeError(error)}`);
      return "failed";
    }
  }
}
