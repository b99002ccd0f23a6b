import { Entity, Column } from 'typeorm';
import { BaseDocument } from './base-document.entity';

@Entity('material')
export class Material extends BaseDocument {
  @Column()
  user_id!: string;

  @Column()
  title!: string;

  @Column({ type: 'string', nullable: true })
  subject!: string | null;

  @Column()
  content!: string;

  // not constrained at storage level
  @Column({ default: 'normal' })
  difficulty!: string;
}
