import { Column, ObjectIdColumn } from 'typeorm';
import { ObjectId } from 'mongodb';

export abstract class BaseDocument {
  @ObjectIdColumn()
  _id!: ObjectId;

  @Column()
  created_at!: Date;

  @Column()
  updated_at!: Date;
}
