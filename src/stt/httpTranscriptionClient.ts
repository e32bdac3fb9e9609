import { type Dispatcher, FormData, request } from "undici";
import { encodeWav } from "../audio/wav";
import { EmptyResultError, TranscriptionError } from "../errors";
import type { AudioClip, ITranscriber, RawTranscript } from "../types/contracts";

interface HttpTranscriptionClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Client for an OpenAI-compatible `POST /audio/transcriptions` endpoint.
 * Each call sends the clip exactly once.
 */
export class HttpTranscriptionClient implements ITranscriber {
  private readonly endpoint: string;

  constructor(private readonly options: HttpTranscriptionClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/audio/transcriptions`;
  }

  async transcribe(clip: AudioClip, prompt: string, modelName: string): Promise<RawTranscript> {
    const form = new FormData();
    const wav = encodeWav(clip.pcm16, clip.sampleRateHz, clip.channels);
    form.append("file", new Blob([wav], { type: "audio/wav" }), "audio.wav");
    form.append("model", modelName);
    form.append("response_format", "json");
    if (prompt.trim()) {
      form.append("prompt", prompt);
    }

    let res: Dispatcher.ResponseData;
    try {
      res = await request(this.endpoint, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          accept: "application/json"
        },
        body: form,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher
      });
    } catch (error) {
      throw TranscriptionError.fromNetwork(error);
    }

    let raw: string;
    try {
      raw = await res.body.text();
    } catch (error) {
      throw TranscriptionError.fromNetwork(error);
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw TranscriptionError.fromStatus(res.statusCode, raw);
    }

    const text = extractText(raw).trim();
    if (!text) {
      throw new EmptyResultError();
    }
    return { text };
  }
}

function extractText(raw: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new EmptyResultError("Transcription response was not JSON.");
  }
  if (payload && typeof payload === "object" && "text" in payload && typeof payload.text === "string") {
    return payload.text;
  }
  throw new EmptyResultError("Transcription response had no text field.");
}
