import OpenAI from "openai";
import { ISpeechSynthesizer, SpeechSynthesisOptions } from "../../domain/interfaces/ispeech.synthesizer";
import { isSpeechVoice } from "../../domain/enums/speech.voices";

export interface OpenAISpeechSynthesizerOptions {
  apiKey: string;
  model: string;
}

export class OpenAISpeechSynthesizer implements ISpeechSynthesizer {
  private client: OpenAI;

  constructor(private options: OpenAISpeechSynthesizerOptions) {
    // Retries and timeouts are decided per chunk by the synthesis invoker
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async synthesize(text: string, voice: string, options?: SpeechSynthesisOptions): Promise<Buffer> {
    if (!isSpeechVoice(voice)) {
      throw new Error(`Unsupported voice: ${voice}`);
    }

    const response = await this.client.audio.speech.create(
      {
        model: this.options.model,
        voice,
        input: text,
        response_format: "mp3",
      },
      { signal: options?.signal }
    );

    return Buffer.from(await response.arrayBuffer());
  }
}
