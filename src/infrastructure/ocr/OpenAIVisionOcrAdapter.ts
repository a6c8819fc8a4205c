import OpenAI from 'openai';
import type { OcrPort } from '../../domain/ports/OcrPort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

export interface OpenAIVisionOcrConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs?: number;
}

const OCR_SYSTEM_PROMPT = [
  'You are an OCR engine.',
  'Transcribe every piece of text visible in the page image exactly as written, in its original language.',
  'Keep paragraph breaks as blank lines. Do not translate, summarize or describe images.',
  'Return only the transcription. If the page has no text, return an empty response.',
].join(' ');

/**
 * 以 vision 模型辨識頁面影像
 *
 * 支援任何 OpenAI-compatible endpoint（需支援 image_url content part）。
 */
export class OpenAIVisionOcrAdapter implements OcrPort {
  readonly providerId = 'openai-vision';
  private readonly client: OpenAI;
  private readonly logger = new Logger('OpenAIVisionOcrAdapter');

  constructor(private readonly config: OpenAIVisionOcrConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 1,
      timeout: config.timeoutMs ?? 60000,
    });
  }

  async recognize(image: Uint8Array, pageNumber: number): Promise<string> {
    const dataUrl = `data:image/png;base64,${Buffer.from(image).toString('base64')}`;

    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        temperature: 0,
        messages: [
          { role: 'system', content: OCR_SYSTEM_PROMPT },
          {
            role: 'user',
            content: [
              { type: 'text', text: `Transcribe page ${pageNumber}.` },
              { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } },
            ],
          },
        ],
      });

      return response.choices[0]?.message?.content?.trim() ?? '';
    } catch (err) {
      this.logger.warn('OCR request failed', { pageNumber, error: errorMessage(err) });
      throw err;
    }
  }
}
