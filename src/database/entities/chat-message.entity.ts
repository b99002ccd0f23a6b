import { Entity, Column } from 'typeorm';
import { BaseDocument } from './base-document.entity';

export type ChatRole = 'user' | 'assistant';

@Entity('chatmessage')
export class ChatMessage extends BaseDocument {
  @Column()
  user_id!: string;

  @Column({ type: 'string' })
  role!: ChatRole;

  @Column()
  content!: string;

  @Column({ type: 'string', nullable: true })
  emotion_context!: string | null;
}
