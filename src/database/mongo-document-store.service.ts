import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, MongoEntityManager } from 'typeorm';
import { MongoDriver } from 'typeorm/driver/mongodb/MongoDriver';
import { ObjectId } from 'mongodb';
import { BaseDocument } from './entities/base-document.entity';
import {
  DocumentClass,
  DocumentFields,
  DocumentFilter,
  DocumentStore,
  FindDocumentsOptions,
} from './document-store';
import { APP_DEFAULTS } from '../config/app.config';
import { errorMessage } from '../helpers/error-message';

@Injectable()
export class MongoDocumentStore extends DocumentStore implements OnModuleInit {
  private readonly logger = new Logger(MongoDocumentStore.name);
  private connecting: Promise<DataSource> | null = null;

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {
    super();
  }

  private get databaseName(): string {
    return this.configService.get<string>(
      'DATABASE_NAME',
      APP_DEFAULTS.databaseName,
    );
  }

  async onModuleInit() {
    try {
      await this.connect();
      this.logger.log(`Connected to MongoDB database "${this.databaseName}"`);
    } catch (e) {
      this.logger.warn(
        `MongoDB connection on startup failed: ${errorMessage(e)}`,
      );
    }
  }

  // The app starts without a reachable database; every call retries the
  // connection until one succeeds. While the database is down each request
  // can wait out the driver's full server selection timeout.
  private connect(): Promise<DataSource> {
    if (this.dataSource.isInitialized) {
      return Promise.resolve(this.dataSource);
    }
    if (!this.connecting) {
      this.connecting = this.dataSource.initialize().catch((e: unknown) => {
        this.connecting = null;
        throw e;
      });
    }
    return this.connecting;
  }

  private async manager(): Promise<MongoEntityManager> {
    const dataSource = await this.connect();
    return dataSource.mongoManager;
  }

  async createDocument<T extends BaseDocument>(
    collection: DocumentClass<T>,
    fields: DocumentFields<T>,
  ): Promise<string> {
    const manager = await this.manager();
    const now = new Date();
    const document = Object.assign(new collection(), fields, {
      created_at: now,
      updated_at: now,
    });
    const saved = await manager.save(document);
    return saved._id.toHexString();
  }

  async getDocuments<T extends BaseDocument>(
    collection: DocumentClass<T>,
    filter: DocumentFilter,
    options: FindDocumentsOptions = {},
  ): Promise<T[]> {
    const manager = await this.manager();
    const cursor = manager.createEntityCursor(collection, filter);
    if (options.newestFirst) {
      cursor.sort({ created_at: -1, _id: -1 });
    }
    if (options.limit !== undefined) {
      cursor.limit(options.limit);
    }
    return cursor.toArray();
  }

  async findOne<T extends BaseDocument>(
    collection: DocumentClass<T>,
    filter: DocumentFilter,
  ): Promise<T | null> {
    const [first] = await this.getDocuments(collection, filter, { limit: 1 });
    return first ?? null;
  }

  async findById<T extends BaseDocument>(
    collection: DocumentClass<T>,
    id: string,
  ): Promise<T | null> {
    const _id = new ObjectId(id);
    const manager = await this.manager();
    const [first] = await manager
      .createEntityCursor(collection, { _id })
      .limit(1)
      .toArray();
    return first ?? null;
  }

  isConnected(): boolean {
    return this.dataSource.isInitialized;
  }

  private async database() {
    const dataSource = await this.connect();
    const driver = dataSource.driver;
    if (!(driver instanceof MongoDriver) || !driver.queryRunner) {
      throw new Error('DataSource is not backed by the MongoDB driver');
    }
    return driver.queryRunner.databaseConnection.db(this.databaseName);
  }

  async ping(): Promise<void> {
    const db = await this.database();
    await db.command({ ping: 1 });
  }

  async listCollections(): Promise<string[]> {
    const db = await this.database();
    const collections = await db
      .listCollections({}, { nameOnly: true })
      .toArray();
    return collections.map((c) => c.name);
  }
}
