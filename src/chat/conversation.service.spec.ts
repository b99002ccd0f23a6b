import { Test } from '@nestjs/testing';
import { ConversationService } from './conversation.service';
import { SYSTEM_PROMPT } from './chat-prompts';
import { DocumentStore } from '../database/document-store';
import { ChatMessage, ChatRole } from '../database/entities/chat-message.entity';
import { LlmService } from '../ai/llm.service';
import { InMemoryDocumentStore } from '../../test/support/in-memory-document-store';
import { createLlmStub, LlmStub } from '../../test/support/create-test-app';

describe('ConversationService', () => {
  let service: ConversationService;
  let store: InMemoryDocumentStore;
  let llm: LlmStub;

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    llm = createLlmStub();
    llm.isConfigured.mockReturnValue(true);
    llm.chatCompletion.mockResolvedValue('Good question.');

    const moduleRef = await Test.createTestingModule({
      providers: [
        ConversationService,
        { provide: DocumentStore, useValue: store },
        { provide: LlmService, useValue: llm },
      ],
    }).compile();
    service = moduleRef.get(ConversationService);
  });

  const seed = (userId: string, role: ChatRole, content: string) =>
    store.createDocument(ChatMessage, {
      user_id: userId,
      role,
      content,
      emotion_context: null,
    });

  it('sends the instruction, the history oldest first, then the message', async () => {
    await seed('u1', 'user', 'What is 2+2?');
    await seed('u1', 'assistant', '4');
    await seed('u2', 'user', 'Unrelated');

    const result = await service.reply({
      user_id: 'u1',
      message: 'And 3+3?',
      emotion_hint: 'confused',
    });

    expect(result).toEqual({ reply: 'Good question.' });
    expect(llm.chatCompletion).toHaveBeenCalledWith(
      [
        {
          role: 'system',
          content: `${SYSTEM_PROMPT} Current learner emotional state: confused. Adjust tone accordingly.`,
        },
        { role: 'user', content: 'What is 2+2?' },
        { role: 'assistant', content: '4' },
        { role: 'user', content: 'And 3+3?' },
        { role: 'user', content: 'And 3+3?' },
      ],
      { temperature: 0.7, maxTokens: 400 },
    );
  });

  it('keeps only the last eight messages', async () => {
    for (let i = 0; i < 10; i++) {
      await seed('u1', i % 2 === 0 ? 'user' : 'assistant', `m${i}`);
    }

    await service.reply({ user_id: 'u1', message: 'new' });

    const [messages] = llm.chatCompletion.mock.calls[0];
    expect(messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT });
    expect(
      messages.slice(1, -1).map((m: { content: string }) => m.content),
    ).toEqual(['m3', 'm4', 'm5', 'm6', 'm7', 'm8', 'm9', 'new']);
  });

  it('sends no history when it cannot be read', async () => {
    jest
      .spyOn(store, 'getDocuments')
      .mockRejectedValueOnce(new Error('cursor killed'));

    await service.reply({ user_id: 'u1', message: 'Hello' });

    expect(llm.chatCompletion).toHaveBeenCalledWith(
      [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'Hello' },
      ],
      { temperature: 0.7, maxTokens: 400 },
    );
  });

  it('falls back and stores both messages when the provider fails', async () => {
    llm.chatCompletion.mockRejectedValue(new Error('LLM API error 503'));

    const result = await service.reply({
      user_id: 'u1',
      message: 'I give up',
      emotion_hint: 'angry',
    });

    expect(result.reply).toBe(
      "In a calm and concise tone: I hear you said: 'I give up'. Let's work through this together.",
    );
    expect(
      store.all(ChatMessage).map((m) => [m.role, m.content, m.emotion_context]),
    ).toEqual([
      ['user', 'I give up', 'angry'],
      ['assistant', result.reply, 'angry'],
    ]);
  });

  it('does not read history when no provider is configured', async () => {
    llm.isConfigured.mockReturnValue(false);
    const getDocuments = jest.spyOn(store, 'getDocuments');

    await service.reply({ user_id: 'u1', message: 'Hi', emotion_hint: 'happy' });

    expect(getDocuments).not.toHaveBeenCalled();
    expect(llm.chatCompletion).not.toHaveBeenCalled();
    expect(store.all(ChatMessage)).toHaveLength(2);
  });

  it('returns recent history in chronological order', async () => {
    await seed('u1', 'user', 'first');
    await seed('u1', 'assistant', 'second');
    await seed('u1', 'user', 'third');

    await expect(service.recentHistory('u1', 2)).resolves.toEqual([
      { role: 'assistant', content: 'second' },
      { role: 'user', content: 'third' },
    ]);
  });
});
