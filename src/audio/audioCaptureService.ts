import type { EventEmitter } from "node:events";
import { execFile, spawn } from "node:child_process";
import type { Readable } from "node:stream";
import type { RecorderBackend } from "../config/settings";
import { DeviceError, describeError, sanitizeForLog } from "../errors";
import { type Logger, silentLogger } from "../logging/logger";
import type { AudioClip, IAudioCapture } from "../types/contracts";
import { pcmDurationMs } from "./wav";

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

/** The slice of ChildProcess the capture service drives. */
export interface RecorderProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnRecorder = (binaryPath: string, args: string[]) => RecorderProcess;

export interface CaptureOptions {
  sampleRateHz: number;
  channels: number;
  minDurationMs: number;
  recorder?: RecorderBackend;
  logger?: Logger;
  spawnRecorder?: SpawnRecorder;
  detectRecorder?: () => Promise<RecorderInfo | undefined>;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface RecordingSession {
  recorder: RecorderInfo;
  proc: RecorderProcess;
  startedAt: Date;
  chunks: Buffer[];
  stderr: string;
  stopRequested: boolean;
  failure?: DeviceError;
  exited: Promise<ExitStatus>;
}

const STOP_GRACE_MS = 2000;

export class AudioCaptureService implements IAudioCapture {
  private session?: RecordingSession;
  private starting = false;
  private abortWhileStarting = false;
  private detectedRecorder?: RecorderInfo;
  private readonly logger: Logger;
  private readonly spawnRecorder: SpawnRecorder;

  constructor(private readonly options: CaptureOptions) {
    this.logger = options.logger ?? silentLogger;
    this.spawnRecorder = options.spawnRecorder ?? spawnPiped;
  }

  get isRecording(): boolean {
    return this.session !== undefined || this.starting;
  }

  async start(): Promise<void> {
    if (this.isRecording) {
      throw new Error("Already recording.");
    }

    this.starting = true;
    this.abortWhileStarting = false;
    try {
      const recorder = await this.resolveRecorder();
      this.throwIfAborted();
      const args = buildRecorderArgs(recorder, this.options.sampleRateHz, this.options.channels);
      this.logger.debug(`Spawning ${recorder.binaryPath} ${args.join(" ")}`);

      let proc: RecorderProcess;
      try {
        proc = this.spawnRecorder(recorder.binaryPath, args);
      } catch (error) {
        throw new DeviceError(`Recording failed to start: ${describeError(error)}`, error);
      }

      const session = this.attach(recorder, proc);
      await waitForSpawn(proc);
      if (this.abortWhileStarting) {
        session.stopRequested = true;
        killProc(proc, "SIGKILL");
        this.throwIfAborted();
      }
      this.session = session;
      this.logger.info("Recording...");
    } finally {
      this.starting = false;
    }
  }

  async stop(): Promise<AudioClip | undefined> {
    const session = this.session;
    if (!session) {
      return undefined;
    }
    this.session = undefined;
    session.stopRequested = true;

    killProc(session.proc, "SIGTERM");
    const forceKill = setTimeout(() => killProc(session.proc, "SIGKILL"), STOP_GRACE_MS);
    try {
      await session.exited;
    } finally {
      clearTimeout(forceKill);
    }

    if (session.failure) {
      throw session.failure;
    }

    const { sampleRateHz, channels, minDurationMs } = this.options;
    const joined = Buffer.concat(session.chunks);
    const pcm16 = joined.subarray(0, joined.length - (joined.length % (2 * channels)));
    const durationMs = pcmDurationMs(pcm16.length, sampleRateHz, channels);

    if (pcm16.length === 0 || durationMs < minDurationMs) {
      this.logger.info(`Discarding ${durationMs} ms capture (minimum ${minDurationMs} ms).`);
      return undefined;
    }

    return {
      pcm16,
      sampleRateHz,
      channels,
      startedAtIso: session.startedAt.toISOString(),
      durationMs
    };
  }

  abort(): void {
    const session = this.session;
    if (!session) {
      if (this.starting) {
        this.abortWhileStarting = true;
        this.logger.debug("Recording aborted while starting.");
      }
      return;
    }
    this.session = undefined;
    session.stopRequested = true;
    killProc(session.proc, "SIGKILL");
    this.logger.debug("Recording aborted.");
  }

  private throwIfAborted(): void {
    if (this.abortWhileStarting) {
      throw new DeviceError("Recording was aborted before it started.");
    }
  }

  private attach(recorder: RecorderInfo, proc: RecorderProcess): RecordingSession {
    const session: RecordingSession = {
      recorder,
      proc,
      startedAt: new Date(),
      chunks: [],
      stderr: "",
      stopRequested: false,
      exited: new Promise<ExitStatus>((resolve) => {
        proc.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
          resolve({ code, signal });
        });
      })
    };

    proc.stdout?.on("data", (chunk: Buffer) => session.chunks.push(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => {
      session.stderr += chunk.toString();
    });

    proc.on("error", (err: Error) => {
      session.failure ??= new DeviceError(`Recorder error: ${err.message}`, err);
    });

    void session.exited.then(({ code, signal }) => {
      if (isExpectedExit(recorder.backend, session.stopRequested, code, signal)) {
        return;
      }
      const msg = sanitizeForLog(session.stderr).slice(0, 300);
      if (session.stopRequested) {
        // The audio already captured is still usable.
        this.logger.warn(`Recorder did not stop cleanly (code ${code}, signal ${signal}).`, msg || undefined);
        return;
      }
      session.failure ??= new DeviceError(`Recording exited with code ${code}: ${msg}`);
      this.logger.warn(`Recorder exited unexpectedly (code ${code}).`, msg || undefined);
    });

    return session;
  }

  private async resolveRecorder(): Promise<RecorderInfo> {
    if (this.options.recorder) {
      return { backend: this.options.recorder, binaryPath: this.options.recorder };
    }
    if (!this.detectedRecorder) {
      const detect = this.options.detectRecorder ?? detectRecorder;
      this.detectedRecorder = await detect();
    }
    if (!this.detectedRecorder) {
      throw new DeviceError(missingRecorderMessage());
    }
    return this.detectedRecorder;
  }
}

function spawnPiped(binaryPath: string, args: string[]): RecorderProcess {
  return spawn(binaryPath, args, { stdio: ["ignore", "pipe", "pipe"] });
}

function waitForSpawn(proc: RecorderProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      proc.off("error", onError);
      resolve();
    };
    const onError = (err: Error): void => {
      proc.off("spawn", onSpawn);
      reject(new DeviceError(`Recording failed to start: ${err.message}`, err));
    };
    proc.once("spawn", onSpawn);
    proc.once("error", onError);
  });
}

function killProc(proc: RecorderProcess, signal: NodeJS.Signals): void {
  proc.kill(signal);
}

/**
 * Whether a recorder's exit status is what the capture asked for. Once stop
 * or abort has signalled the process, the signal itself counts, as does the
 * status code each backend reports when it is interrupted.
 */
export function isExpectedExit(
  backend: RecorderBackend,
  stopRequested: boolean,
  code: number | null,
  signal: NodeJS.Signals | null
): boolean {
  if (code === 0) {
    return true;
  }
  if (!stopRequested) {
    return false;
  }
  if (signal === "SIGTERM" || signal === "SIGKILL" || signal === "SIGINT") {
    return true;
  }
  return code === INTERRUPTED_EXIT_CODE[backend];
}

const INTERRUPTED_EXIT_CODE: Record<RecorderBackend, number | undefined> = {
  arecord: 1,
  ffmpeg: 255,
  sox: undefined
};

export function buildRecorderArgs(
  recorder: RecorderInfo,
  sampleRateHz: number,
  channels: number,
  platform: NodeJS.Platform = process.platform
): string[] {
  const rate = String(sampleRateHz);
  const ch = String(channels);

  switch (recorder.backend) {
    case "sox":
      return ["-q", "-d", "-t", "raw", "-r", rate, "-c", ch, "-b", "16", "-e", "signed-integer", "-L", "-"];
    case "arecord":
      return ["-q", "-f", "S16_LE", "-r", rate, "-c", ch, "-t", "raw"];
    case "ffmpeg": {
      const [format, device] = ffmpegMicrophone(platform);
      return [
        "-hide_banner", "-loglevel", "error",
        "-f", format, "-i", device,
        "-ar", rate, "-ac", ch, "-f", "s16le", "-"
      ];
    }
  }
}

/** ffmpeg's capture format and default microphone name on each platform. */
function ffmpegMicrophone(platform: NodeJS.Platform): [format: string, device: string] {
  switch (platform) {
    case "win32": return ["dshow", "audio=default"];
    case "darwin": return ["avfoundation", ":default"];
    default: return ["pulse", "default"];
  }
}

/** Recorders to look for, in order of preference. */
const RECORDER_PREFERENCE: Partial<Record<NodeJS.Platform, RecorderBackend[]>> = {
  linux: ["arecord", "sox", "ffmpeg"],
  win32: ["ffmpeg", "sox"]
};
const DEFAULT_PREFERENCE: RecorderBackend[] = ["sox", "ffmpeg"];

export async function detectRecorder(
  platform: NodeJS.Platform = process.platform,
  onPath: (binary: string) => Promise<boolean> = isOnPath
): Promise<RecorderInfo | undefined> {
  for (const backend of RECORDER_PREFERENCE[platform] ?? DEFAULT_PREFERENCE) {
    if (await onPath(backend)) {
      return { backend, binaryPath: backend };
    }
  }
  return undefined;
}

function isOnPath(binary: string): Promise<boolean> {
  const lookup = process.platform === "win32" ? "where" : "which";
  return new Promise((resolve) => {
    execFile(lookup, [binary], (err) => resolve(!err));
  });
}

function missingRecorderMessage(platform: NodeJS.Platform = process.platform): string {
  const hint =
    platform === "darwin" ? "Install SoX (brew install sox)"
    : platform === "linux" ? "Install alsa-utils for arecord (sudo apt install alsa-utils) or SoX"
    : platform === "win32" ? "Install FFmpeg (winget install ffmpeg)"
    : "Install SoX or FFmpeg";
  return `No audio recorder found on PATH. ${hint}, or set DICTATION_RECORDER to sox, arecord or ffmpeg.`;
}
