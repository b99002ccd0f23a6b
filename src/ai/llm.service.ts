import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { isAxiosError } from 'axios';
import { APP_DEFAULTS } from '../config/app.config';

export type LlmRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

export interface LlmCompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string | null };
  }>;
  usage?: { total_tokens?: number };
}

/**
 * Client for an OpenAI-compatible chat completions endpoint.
 * Enabled only when OPENAI_API_KEY is set.
 */
@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {}

  private get apiKey(): string | undefined {
    return this.configService.get<string>('OPENAI_API_KEY')?.trim() || undefined;
  }

  get model(): string {
    return (
      this.configService.get<string>('OPENAI_MODEL')?.trim() ||
      APP_DEFAULTS.llmModel
    );
  }

  private get completionsUrl(): string {
    const baseUrl =
      this.configService.get<string>('OPENAI_BASE_URL')?.trim() ||
      APP_DEFAULTS.llmBaseUrl;
    return `${baseUrl.replace(/\/+$/, '')}/chat/completions`;
  }

  private get timeoutMs(): number {
    const raw = Number(this.configService.get<string>('LLM_TIMEOUT_MS'));
    return Number.isFinite(raw) && raw > 0 ? raw : APP_DEFAULTS.llmTimeoutMs;
  }

  isConfigured(): boolean {
    return this.apiKey !== undefined;
  }

  async chatCompletion(
    messages: LlmMessage[],
    options: LlmCompletionOptions = {},
  ): Promise<string> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new Error('Language-model provider is not configured');
    }

    const model = this.model;
    this.logger.debug(
      `Requesting completion from ${model} with ${messages.length} messages`,
    );

    try {
      const { data } = await firstValueFrom(
        this.httpService.post<ChatCompletionResponse>(
          this.completionsUrl,
          {
            model,
            messages,
            temperature: options.temperature,
            max_tokens: options.maxTokens,
          },
          {
            headers: {
              Authorization: `Bearer ${apiKey}`,
              'Content-Type': 'application/json',
            },
            timeout: this.timeoutMs,
          },
        ),
      );

      const content = data?.choices?.[0]?.message?.content;
      if (typeof content !== 'string' || content.trim().length === 0) {
        throw new Error(`Empty completion returned by ${model}`);
      }
      if (data.usage?.total_tokens) {
        this.logger.debug(`${model} used ${data.usage.total_tokens} tokens`);
      }
      return content.trim();
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        this.logger.error(
          `LLM API error (${model}): ${error.response.status} - ${JSON.stringify(error.response.data)}`,
        );
      }
      throw error;
    }
  }
}
