export interface AudioClip {
  pcm16: Buffer;
  sampleRateHz: number;
  channels: number;
  startedAtIso: string;
  durationMs: number;
}

export interface RawTranscript {
  text: string;
}

export interface CommandRule {
  name: string;
  triggers: readonly string[];
  escapePrefix: string;
  symbol: string;
}

export type RecordingState = "idle" | "recording" | "flushing";

export type CycleOutcome = "typed" | "empty" | "skipped" | "failed";

export interface ITranscriber {
  transcribe(clip: AudioClip, prompt: string, modelName: string): Promise<RawTranscript>;
}

export interface ITextInjector {
  insert(text: string): Promise<void>;
}

export interface IAudioCapture {
  readonly isRecording: boolean;
  start(): Promise<void>;
  stop(): Promise<AudioClip | undefined>;
  abort(): void;
}
