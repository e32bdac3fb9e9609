import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FormData, MockAgent } from "undici";
import { EmptyResultError, TranscriptionError } from "../errors";
import type { AudioClip } from "../types/contracts";
import { HttpTranscriptionClient } from "./httpTranscriptionClient";

const ORIGIN = "http://stt.test";
const PATH = "/v1/audio/transcriptions";

const clip: AudioClip = {
  pcm16: Buffer.alloc(6400),
  sampleRateHz: 16000,
  channels: 1,
  startedAtIso: "2026-01-01T00:00:00.000Z",
  durationMs: 200
};

describe("HttpTranscriptionClient", () => {
  let mockAgent: MockAgent;
  let client: HttpTranscriptionClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    client = new HttpTranscriptionClient({
      baseUrl: `${ORIGIN}/v1/`,
      apiKey: "test-secret",
      timeoutMs: 1000,
      dispatcher: mockAgent
    });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it("posts the clip with a bearer token and returns the trimmed text", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST", headers: { authorization: "Bearer test-secret" } })
      .reply(200, { text: "  hello comma world  " });

    await expect(client.transcribe(clip, "Names: Kyrkjsæterøra", "whisper-1")).resolves.toEqual({
      text: "hello comma world"
    });
    mockAgent.assertNoPendingInterceptors();
  });

  it("sends the model, prompt and audio as form fields", async () => {
    let sent: FormData | undefined;
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(200, (opts) => {
        if (opts.body instanceof FormData) {
          sent = opts.body;
        }
        return { text: "ok" };
      });

    await client.transcribe(clip, "Names: Gloucestershire", "distil-large");

    expect(sent?.get("model")).toBe("distil-large");
    expect(sent?.get("prompt")).toBe("Names: Gloucestershire");
    expect(sent?.get("response_format")).toBe("json");
    expect(sent?.has("file")).toBe(true);
  });

  it("leaves out a blank prompt", async () => {
    let sent: FormData | undefined;
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .reply(200, (opts) => {
        if (opts.body instanceof FormData) {
          sent = opts.body;
        }
        return { text: "ok" };
      });

    await client.transcribe(clip, "  ", "whisper-1");

    expect(sent?.has("prompt")).toBe(false);
  });

  it("surfaces a bad status as a transcription error without retrying", async () => {
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: "POST" }).reply(401, "invalid api key");

    const result = client.transcribe(clip, "", "whisper-1");

    await expect(result).rejects.toBeInstanceOf(TranscriptionError);
    await expect(result).rejects.toMatchObject({
      statusCode: 401,
      message: "Transcription request failed (401): invalid api key"
    });
    mockAgent.assertNoPendingInterceptors();
  });

  it("surfaces network failures as transcription errors", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: "POST" })
      .replyWithError(new Error("connect ECONNREFUSED"));

    const result = client.transcribe(clip, "", "whisper-1");

    await expect(result).rejects.toBeInstanceOf(TranscriptionError);
    await expect(result).rejects.toMatchObject({
      statusCode: undefined,
      message: "Transcription request failed: connect ECONNREFUSED"
    });
  });

  it("treats a whitespace-only transcript as an empty result", async () => {
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: "POST" }).reply(200, { text: " \n " });

    await expect(client.transcribe(clip, "", "whisper-1")).rejects.toBeInstanceOf(EmptyResultError);
  });

  it("treats a body without text as an empty result", async () => {
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: "POST" }).reply(200, { segments: [] });

    await expect(client.transcribe(clip, "", "whisper-1")).rejects.toThrow(
      "Transcription response had no text field."
    );
  });

  it("treats a non-JSON body as an empty result", async () => {
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: "POST" }).reply(200, "<html></html>");

    await expect(client.transcribe(clip, "", "whisper-1")).rejects.toThrow(
      "Transcription response was not JSON."
    );
  });
});
