import { Injectable, Logger } from '@nestjs/common';
import { DocumentStore } from '../database/document-store';
import { ChatMessage } from '../database/entities/chat-message.entity';
import { LlmMessage, LlmService } from '../ai/llm.service';
import { errorMessage } from '../helpers/error-message';
import { ChatRequestDto } from './dto/chat-request.dto';
import { fallbackReply, systemInstruction } from './chat-prompts';

export const HISTORY_WINDOW = 8;
export const CHAT_TEMPERATURE = 0.7;
export const CHAT_MAX_TOKENS = 400;

/**
 * Answers a learner message. Both sides of the exchange are stored, and a
 * provider failure degrades to a templated reply instead of an error.
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);

  constructor(
    private readonly store: DocumentStore,
    private readonly llmService: LlmService,
  ) {}

  async reply(dto: ChatRequestDto): Promise<{ reply: string }> {
    const emotionContext = dto.emotion_hint ?? null;

    await this.store.createDocument(ChatMessage, {
      user_id: dto.user_id,
      role: 'user',
      content: dto.message,
      emotion_context: emotionContext,
    });

    const reply = await this.generateReply(dto);

    await this.store.createDocument(ChatMessage, {
      user_id: dto.user_id,
      role: 'assistant',
      content: reply,
      emotion_context: emotionContext,
    });
    return { reply };
  }

  private async generateReply(dto: ChatRequestDto): Promise<string> {
    if (!this.llmService.isConfigured()) {
      return fallbackReply(dto.message, dto.emotion_hint);
    }

    try {
      const history = await this.recentHistory(dto.user_id);
      const messages: LlmMessage[] = [
        { role: 'system', content: systemInstruction(dto.emotion_hint) },
        ...history,
        { role: 'user', content: dto.message },
      ];
      return await this.llmService.chatCompletion(messages, {
        temperature: CHAT_TEMPERATURE,
        maxTokens: CHAT_MAX_TOKENS,
      });
    } catch (e) {
      this.logger.warn(
        `Falling back to templated reply for user ${dto.user_id}: ${errorMessage(e)}`,
      );
      return fallbackReply(dto.message, dto.emotion_hint);
    }
  }

  /** Last messages for the user, oldest first. */
  async recentHistory(
    userId: string,
    limit: number = HISTORY_WINDOW,
  ): Promise<LlmMessage[]> {
    try {
      const newestFirst = await this.store.getDocuments(
        ChatMessage,
        { user_id: userId },
        { newestFirst: true, limit },
      );
      return newestFirst.reverse().map((m): LlmMessage => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content ?? '',
      }));
    } catch (e) {
      this.logger.warn(
        `Chat history unavailable for user ${userId}: ${errorMessage(e)}`,
      );
      return [];
    }
  }
}
