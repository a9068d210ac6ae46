import { describe, it, expect, vi } from "vitest";
import {
  TranscriptionEngine,
  type DeepgramPrerecordedClient,
  type DeepgramPrerecordedOptions,
  type DeepgramPrerecordedResponse,
  type OpenAITranscriptionClient,
  type OpenAITranscriptionResponse,
} from "./transcription-engine.js";
import { FrontEndError } from "./errors.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

type OpenAITranscriptionParams = Parameters<OpenAITranscriptionClient["audio"]["transcriptions"]["create"]>[0];

const AUDIO = Buffer.from("fake wav bytes");

function deepgramResponse(): DeepgramPrerecordedResponse {
  return {
    result: {
      results: {
        channels: [
          {
            alternatives: [
              {
                transcript: " Hello, world. ",
                confidence: 0.93,
                words: [
                  { word: "hello", start: 0.5, end: 0.9, confidence: 0.95, punctuated_word: "Hello," },
                  { word: "world", start: 1.0, end: 1.4, confidence: 0.9 },
                ],
              },
            ],
          },
        ],
      },
    },
    error: null,
  };
}

function createMockDeepgramClient(
  impl: () => Promise<DeepgramPrerecordedResponse> = async () => deepgramResponse(),
) {
  const transcribeFile = vi.fn(
    (_source: Buffer, _options: DeepgramPrerecordedOptions): Promise<DeepgramPrerecordedResponse> => impl(),
  );
  const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
  return { client, transcribeFile };
}

function createMockOpenAIClient(
  impl: () => Promise<OpenAITranscriptionResponse> = async () => ({
    text: "Hello world.",
    words: [
      { word: " Hello", start: 0.5, end: 0.9 },
      { word: "world. ", start: 1.0, end: 1.4 },
    ],
  }),
) {
  const create = vi.fn((_params: OpenAITranscriptionParams): Promise<OpenAITranscriptionResponse> => impl());
  const client: OpenAITranscriptionClient = { audio: { transcriptions: { create } } };
  return { client, create };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("TranscriptionEngine", () => {
  it("requires at least one provider", () => {
    expect(() => new TranscriptionEngine({})).toThrow(
      "TranscriptionEngine needs a Deepgram or an OpenAI client",
    );
  });

  describe("Deepgram", () => {
    it("maps punctuated words and keeps provider confidence", async () => {
      const { client, transcribeFile } = createMockDeepgramClient();
      const engine = new TranscriptionEngine({ deepgramClient: client, logger: createSilentLogger() });

      const result = await engine.transcribe(AUDIO, "audio/wav", "en");

      expect(transcribeFile).toHaveBeenCalledWith(AUDIO, {
        model: "nova-2",
        language: "en",
        punctuate: true,
        smart_format: true,
      });
      expect(result).toEqual({
        words: [
          { word: "Hello,", startTime: 0.5, endTime: 0.9, confidence: 0.95 },
          { word: "world", startTime: 1.0, endTime: 1.4, confidence: 0.9 },
        ],
        text: "Hello, world.",
        provider: "deepgram",
        model: "nova-2",
        qualityWarning: false,
      });
    });

    it("returns an empty transcript when no alternative comes back", async () => {
      const { client } = createMockDeepgramClient(async () => ({
        result: { results: { channels: [] } },
        error: null,
      }));
      const engine = new TranscriptionEngine({ deepgramClient: client, deepgramModel: "nova-3" });

      const result = await engine.transcribe(AUDIO, "audio/wav", "de");
      expect(result.words).toEqual([]);
      expect(result.text).toBe("");
      expect(result.model).toBe("nova-3");
    });

    it("throws FrontEndError when Deepgram fails without a fallback", async () => {
      const { client } = createMockDeepgramClient(async () => ({
        result: null,
        error: { message: "quota exceeded" },
      }));
      const engine = new TranscriptionEngine({ deepgramClient: client });

      const attempt = engine.transcribe(AUDIO, "audio/wav", "en");
      await expect(attempt).rejects.toBeInstanceOf(FrontEndError);
      await expect(attempt).rejects.toThrow("Transcription failed: quota exceeded");
    });
  });

  describe("OpenAI fallback", () => {
    it("falls back when Deepgram errors and flags the result", async () => {
      const { client: deepgramClient } = createMockDeepgramClient(async () => {
        throw new Error("connection reset");
      });
      const { client: openaiClient, create } = createMockOpenAIClient();
      const logger = createSilentLogger();
      const engine = new TranscriptionEngine({ deepgramClient, openaiClient, logger });

      const result = await engine.transcribe(AUDIO, "audio/wav", "en");

      expect(logger.warn).toHaveBeenCalledWith(
        "Deepgram transcription failed, falling back to OpenAI: connection reset",
      );
      expect(result).toEqual({
        words: [
          { word: "Hello", startTime: 0.5, endTime: 0.9, confidence: 1 },
          { word: "world.", startTime: 1.0, endTime: 1.4, confidence: 1 },
        ],
        text: "Hello world.",
        provider: "openai",
        model: "whisper-1",
        qualityWarning: true,
      });

      const params = create.mock.calls[0][0];
      expect(params.model).toBe("whisper-1");
      expect(params.response_format).toBe("verbose_json");
      expect(params.timestamp_granularities).toEqual(["word"]);
      expect(params.language).toBe("en");
      expect(params.file.name).toBe("recording.wav");
      expect(params.file.type).toBe("audio/wav");
      expect(params.file.size).toBe(AUDIO.length);
    });

    it("uses OpenAI directly when it is the only provider", async () => {
      const { client, create } = createMockOpenAIClient(async () => ({ text: "  " }));
      const engine = new TranscriptionEngine({ openaiClient: client });

      const result = await engine.transcribe(AUDIO, "audio/wav", "en");
      expect(create).toHaveBeenCalledTimes(1);
      expect(result.words).toEqual([]);
      expect(result.text).toBe("");
      expect(result.provider).toBe("openai");
    });

    it("reports both failures when every provider fails", async () => {
      const { client: deepgramClient } = createMockDeepgramClient(async () => {
        throw new Error("dg down");
      });
      const { client: openaiClient } = createMockOpenAIClient(async () => {
        throw new Error("oa down");
      });
      const engine = new TranscriptionEngine({ deepgramClient, openaiClient });

      await expect(engine.transcribe(AUDIO, "audio/wav", "en")).rejects.toThrow(
        "Transcription failed: dg down; fallback: oa down",
      );
    });
  });
});
