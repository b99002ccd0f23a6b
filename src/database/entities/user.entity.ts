import { Entity, Column } from 'typeorm';
import { BaseDocument } from './base-document.entity';

@Entity('user')
export class User extends BaseDocument {
  @Column()
  name!: string;

  @Column()
  email!: string;

  // unsalted sha256 hex, see helpers/password-hash.ts
  @Column()
  password_hash!: string;

  @Column({ type: 'string', nullable: true })
  avatar_url!: string | null;
}
