import { ConfigurationError } from "../errors";
import { type LogLevel, isLogLevel } from "../logging/logger";
import { SPELLING_PROMPT } from "./spellingPrompt";

export type RecorderBackend = "sox" | "arecord" | "ffmpeg";

export interface DictationSettings {
  baseUrl: string;
  apiKey: string;
  model: string;
  prompt: string;
  hotkey: string;
  sampleRateHz: number;
  channels: number;
  minRecordingMs: number;
  timeoutMs: number;
  recorder: RecorderBackend | undefined;
  insertTrailingSpace: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_MODEL = "whisper-1";

const RECORDER_BACKENDS: readonly RecorderBackend[] = ["sox", "arecord", "ffmpeg"];

type Env = Record<string, string | undefined>;

/**
 * Collects everything the pipeline needs from the environment and the
 * positional model argument, once, into a frozen value.
 */
export function readSettings(env: Env, args: readonly string[] = []): Readonly<DictationSettings> {
  const cfg = new EnvReader(env);

  const baseUrl = cfg.required("DICTATION_BASE_URL");
  const apiKey = cfg.required("DICTATION_API_KEY");
  assertHttpUrl(baseUrl);

  const logLevel = cfg.string("DICTATION_LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `DICTATION_LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}").`
    );
  }

  return Object.freeze({
    baseUrl: baseUrl.replace(/\/+$/, ""),
    apiKey,
    model: args[0]?.trim() || DEFAULT_MODEL,
    prompt: SPELLING_PROMPT,
    hotkey: cfg.string("DICTATION_HOTKEY", "RIGHT CTRL").toUpperCase(),
    sampleRateHz: cfg.positiveInt("DICTATION_SAMPLE_RATE", 16000),
    channels: 1,
    minRecordingMs: cfg.nonNegativeInt("DICTATION_MIN_RECORDING_MS", 300),
    timeoutMs: cfg.positiveInt("DICTATION_TIMEOUT_MS", 30000),
    recorder: cfg.recorder("DICTATION_RECORDER"),
    insertTrailingSpace: cfg.boolean("DICTATION_TRAILING_SPACE", true),
    logLevel
  });
}

function assertHttpUrl(value: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(`DICTATION_BASE_URL is not a valid URL: "${value}".`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`DICTATION_BASE_URL must use http or https: "${value}".`);
  }
}

class EnvReader {
  constructor(private readonly env: Env) {}

  private raw(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }

  required(key: string): string {
    const value = this.raw(key);
    if (!value) {
      throw new ConfigurationError(`Missing required environment variable ${key}.`);
    }
    return value;
  }

  string(key: string, fallback: string): string {
    return this.raw(key) ?? fallback;
  }

  positiveInt(key: string, fallback: number): number {
    const value = this.int(key, fallback);
    if (value <= 0) {
      throw new ConfigurationError(`${key} must be greater than zero (got ${value}).`);
    }
    return value;
  }

  nonNegativeInt(key: string, fallback: number): number {
    const value = this.int(key, fallback);
    if (value < 0) {
      throw new ConfigurationError(`${key} must not be negative (got ${value}).`);
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw(key)?.toLowerCase();
    if (value === undefined) {
      return fallback;
    }
    if (["1", "true", "yes", "on"].includes(value)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(value)) {
      return false;
    }
    throw new ConfigurationError(`${key} must be a boolean (got "${value}").`);
  }

  recorder(key: string): RecorderBackend | undefined {
    const value = this.raw(key)?.toLowerCase();
    if (value === undefined || value === "auto") {
      return undefined;
    }
    const backend = RECORDER_BACKENDS.find((b) => b === value);
    if (!backend) {
      throw new ConfigurationError(`${key} must be one of sox, arecord, ffmpeg (got "${value}").`);
    }
    return backend;
  }

  private int(key: string, fallback: number): number {
    const value = this.raw(key);
    if (value === undefined) {
      return fallback;
    }
    if (!/^-?\d+$/.test(value)) {
      throw new ConfigurationError(`${key} must be an integer (got "${value}").`);
    }
    return Number.parseInt(value, 10);
  }
}
