import { GoogleGenerativeAI, type Part } from '@google/generative-ai';

export interface InlineAttachment {
  mimeType: string;
  /** base64 payload */
  data: string;
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
  json: boolean;
  attachments?: InlineAttachment[];
}

export interface GenerateResponse {
  text: string;
  finishReason?: string;
  blockReason?: string;
  inputTokens?: number;
  outputTokens?: number;
}

/**
 * Minimal text-generation surface the agents depend on. Refusal detection
 * happens in the caller from `finishReason` / `blockReason`, so providers
 * only report what the API said.
 */
export interface LlmProvider {
  readonly name: string;
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini';
  private ai: GoogleGenerativeAI;

  constructor(apiKey: string) {
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    this.ai = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const model = this.ai.getGenerativeModel({ model: request.model });
    const parts: Part[] = [{ text: request.prompt }];
    for (const attachment of request.attachments ?? []) {
      parts.push({ inlineData: { mimeType: attachment.mimeType, data: attachment.data } });
    }

    const result = await model.generateContent({
      contents: [{ role: 'user', parts }],
      generationConfig: {
        maxOutputTokens: request.maxOutputTokens,
        temperature: request.temperature,
        responseMimeType: request.json ? 'application/json' : 'text/plain',
      },
    });

    const response = result.response;
    const blockReason: string | undefined = response.promptFeedback?.blockReason;
    const candidate = response.candidates?.[0];
    const finishReason: string | undefined = candidate?.finishReason;
    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');

    return {
      text,
      finishReason,
      blockReason,
      inputTokens: response.usageMetadata?.promptTokenCount,
      outputTokens: response.usageMetadata?.candidatesTokenCount,
    };
  }
}
