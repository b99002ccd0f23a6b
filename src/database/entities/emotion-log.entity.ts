import { Entity, Column } from 'typeorm';
import { BaseDocument } from './base-document.entity';

@Entity('emotionlog')
export class EmotionLog extends BaseDocument {
  @Column()
  user_id!: string;

  @Column()
  emotion!: string;

  @Column({ type: 'string', nullable: true })
  note!: string | null;
}
