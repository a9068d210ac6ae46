// Presentation Analyzer - Transcription Engine
//
// Word-level speech-to-text for a complete recording. Deepgram prerecorded
// transcription is the primary path; OpenAI whisper-1 (verbose_json with word
// timestamps) is the fallback. Whisper reports no per-word confidence, so its
// words carry 1.0 and the result is flagged with a quality warning.

import type { AsrProvider, TranscriptWord } from "./types.js";
import { FrontEndError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

// ─── Client interfaces (for testability / dependency injection) ─────────────────

export interface DeepgramPrerecordedOptions {
  model: string;
  language: string;
  punctuate: boolean;
  smart_format: boolean;
}

export interface DeepgramWord {
  word: string;
  start: number;
  end: number;
  confidence: number;
  punctuated_word?: string;
}

export interface DeepgramPrerecordedResponse {
  result: {
    results: {
      channels: Array<{
        alternatives: Array<{
          transcript: string;
          confidence: number;
          words: DeepgramWord[];
        }>;
      }>;
    };
  } | null;
  error: { message: string } | null;
}

/**
 * Minimal surface of the Deepgram SDK's `listen.prerecorded` client.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: DeepgramPrerecordedOptions,
      ): Promise<DeepgramPrerecordedResponse>;
    };
  };
}

export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
  words?: Array<{ word: string; start: number; end: number }>;
}

/**
 * Minimal surface of the OpenAI SDK's `audio.transcriptions.create()`.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format: "verbose_json";
        timestamp_granularities: Array<"word" | "segment">;
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export interface TranscriptionResult {
  words: TranscriptWord[];
  /** Punctuated transcript text as returned by the provider */
  text: string;
  provider: AsrProvider;
  model: string;
  qualityWarning: boolean;
}

export interface TranscriptionEngineOptions {
  deepgramClient?: DeepgramPrerecordedClient | null;
  openaiClient?: OpenAITranscriptionClient | null;
  deepgramModel?: string;
  openaiModel?: string;
  logger?: Logger;
}

export class TranscriptionEngine {
  private readonly deepgramClient: DeepgramPrerecordedClient | null;
  private readonly openaiClient: OpenAITranscriptionClient | null;
  private readonly deepgramModel: string;
  private readonly openaiModel: string;
  private readonly logger: Logger;

  constructor(options: TranscriptionEngineOptions = {}) {
    this.deepgramClient = options.deepgramClient ?? null;
    this.openaiClient = options.openaiClient ?? null;
    this.deepgramModel = options.deepgramModel ?? "nova-2";
    this.openaiModel = options.openaiModel ?? "whisper-1";
    this.logger = options.logger ?? silentLogger;

    if (!this.deepgramClient && !this.openaiClient) {
      throw new Error("TranscriptionEngine needs a Deepgram or an OpenAI client");
    }
  }

  /**
   * Transcribes a complete recording. Throws FrontEndError when every
   * configured provider fails.
   */
  async transcribe(audio: Buffer, mimeType: string, language: string): Promise<TranscriptionResult> {
    let primaryError: string | null = null;

    if (this.deepgramClient) {
      try {
        return await this.transcribeWithDeepgram(this.deepgramClient, audio, language);
      } catch (err) {
        primaryError = errorMessage(err);
        if (!this.openaiClient) {
          throw new FrontEndError(`Transcription failed: ${primaryError}`, { provider: "deepgram" });
        }
        this.logger.warn(`Deepgram transcription failed, falling back to OpenAI: ${primaryError}`);
      }
    }

    if (!this.openaiClient) {
      throw new FrontEndError("No transcription provider configured");
    }

    try {
      return await this.transcribeWithOpenAI(this.openaiClient, audio, mimeType, language);
    } catch (err) {
      const detail = primaryError ? `${primaryError}; fallback: ${errorMessage(err)}` : errorMessage(err);
      throw new FrontEndError(`Transcription failed: ${detail}`, { provider: "openai" });
    }
  }

  private async transcribeWithDeepgram(
    client: DeepgramPrerecordedClient,
    audio: Buffer,
    language: string,
  ): Promise<TranscriptionResult> {
    const { result, error } = await client.listen.prerecorded.transcribeFile(audio, {
      model: this.deepgramModel,
      language,
      punctuate: true,
      smart_format: true,
    });
    if (error) throw new Error(error.message);

    const alternative = result?.results.channels[0]?.alternatives[0];
    if (!alternative) {
      return { words: [], text: "", provider: "deepgram", model: this.deepgramModel, qualityWarning: false };
    }

    return {
      words: alternative.words.map((w) => ({
        word: w.punctuated_word ?? w.word,
        startTime: w.start,
        endTime: w.end,
        confidence: w.confidence,
      })),
      text: alternative.transcript.trim(),
      provider: "deepgram",
      model: this.deepgramModel,
      qualityWarning: false,
    };
  }

  private async transcribeWithOpenAI(
    client: OpenAITranscriptionClient,
    audio: Buffer,
    mimeType: string,
    language: string,
  ): Promise<TranscriptionResult> {
    const file = new File([new Uint8Array(audio)], "recording.wav", { type: mimeType });
    const response = await client.audio.transcriptions.create({
      file,
      model: this.openaiModel,
      response_format: "verbose_json",
      timestamp_granularities: ["word"],
      language,
    });

    return {
      words: (response.words ?? []).map((w) => ({
        word: w.word.trim(),
        startTime: w.start,
        endTime: w.end,
        confidence: 1.0,
      })),
      text: response.text.trim(),
      provider: "openai",
      model: this.openaiModel,
      qualityWarning: true,
    };
  }
}
