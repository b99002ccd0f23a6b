import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp, LlmStub } from './support/create-test-app';
import { InMemoryDocumentStore } from './support/in-memory-document-store';
import { ChatMessage } from '../src/database/entities/chat-message.entity';

describe('chat', () => {
  let app: INestApplication;
  let store: InMemoryDocumentStore;
  let llm: LlmStub;

  beforeEach(async () => {
    ({ app, store, llm } = await createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  const chat = (body: object) =>
    request(app.getHttpServer()).post('/chat').send(body).expect(200);

  it('replies from the template when no provider is configured', async () => {
    const res = await chat({
      user_id: 'u1',
      message: 'I failed my quiz',
      emotion_hint: 'sad',
    });

    expect(res.body).toEqual({
      reply:
        "In a gentle and encouraging tone: I hear you said: 'I failed my quiz'. Let's work through this together.",
    });
    expect(llm.chatCompletion).not.toHaveBeenCalled();

    const stored = store.all(ChatMessage);
    expect(stored.map((m) => [m.role, m.content, m.emotion_context])).toEqual([
      ['user', 'I failed my quiz', 'sad'],
      ['assistant', res.body.reply, 'sad'],
    ]);
  });

  it('returns the provider reply', async () => {
    llm.isConfigured.mockReturnValue(true);
    llm.chatCompletion.mockResolvedValue('Let us review fractions.');

    const res = await chat({ user_id: 'u1', message: 'Help with fractions' });

    expect(res.body).toEqual({ reply: 'Let us review fractions.' });
    const stored = store.all(ChatMessage);
    expect(stored).toHaveLength(2);
    expect(stored[1]).toMatchObject({
      role: 'assistant',
      content: 'Let us review fractions.',
      emotion_context: null,
    });
  });

  it('still stores both messages when the provider fails', async () => {
    llm.isConfigured.mockReturnValue(true);
    llm.chatCompletion.mockRejectedValue(new Error('socket hang up'));

    const res = await chat({ user_id: 'u1', message: 'What is a prime?' });

    expect(res.body.reply).toBe(
      "In a friendly and helpful tone: I hear you said: 'What is a prime?'. Let's work through this together.",
    );
    expect(store.all(ChatMessage).map((m) => m.role)).toEqual([
      'user',
      'assistant',
    ]);
  });

  it('rejects a request without a message', async () => {
    await request(app.getHttpServer())
      .post('/chat')
      .send({ user_id: 'u1' })
      .expect(400);
    expect(store.all(ChatMessage)).toHaveLength(0);
  });
});
