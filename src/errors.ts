export type DictationErrorCode =
  | "CONFIGURATION"
  | "HOTKEY_MONITOR"
  | "DEVICE"
  | "TRANSCRIPTION"
  | "EMPTY_RESULT"
  | "INJECTION";

export class DictationError extends Error {
  constructor(message: string, readonly code: DictationErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DictationError";
  }
}

export class ConfigurationError extends DictationError {
  constructor(message: string) {
    super(message, "CONFIGURATION");
    this.name = "ConfigurationError";
  }
}

/** The global input-monitoring service could not be started. */
export class HotkeyMonitorError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, "HOTKEY_MONITOR", { cause });
    this.name = "HotkeyMonitorError";
  }
}

/** Microphone unavailable, recorder missing, or recorder died mid-session. */
export class DeviceError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, "DEVICE", { cause });
    this.name = "DeviceError";
  }
}

export class TranscriptionError extends DictationError {
  constructor(
    message: string,
    readonly statusCode: number | undefined,
    readonly body: string,
    cause?: unknown
  ) {
    super(message, "TRANSCRIPTION", { cause });
    this.name = "TranscriptionError";
  }

  static fromStatus(statusCode: number, body: string): TranscriptionError {
    const excerpt = sanitizeForLog(body).slice(0, 300);
    return new TranscriptionError(
      `Transcription request failed (${statusCode}): ${excerpt || "no response body"}`,
      statusCode,
      body
    );
  }

  static fromNetwork(error: unknown): TranscriptionError {
    const message = error instanceof Error ? error.message : String(error);
    return new TranscriptionError(
      `Transcription request failed: ${sanitizeForLog(message)}`,
      undefined,
      "",
      error
    );
  }
}

/** The backend answered, but with nothing to type. Not a failure. */
export class EmptyResultError extends DictationError {
  constructor(message = "Transcription returned no text.") {
    super(message, "EMPTY_RESULT");
    this.name = "EmptyResultError";
  }
}

export class InjectionError extends DictationError {
  constructor(message: string, cause?: unknown) {
    super(message, "INJECTION", { cause });
    this.name = "InjectionError";
  }
}

export function sanitizeForLog(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
