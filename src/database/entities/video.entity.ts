import { Entity, Column } from 'typeorm';
import { BaseDocument } from './base-document.entity';

@Entity('video')
export class Video extends BaseDocument {
  @Column()
  user_id!: string;

  @Column()
  title!: string;

  @Column({ type: 'string', nullable: true })
  subject!: string | null;

  @Column()
  url!: string;
}
