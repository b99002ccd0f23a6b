import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DOCUMENT_ENTITIES } from './entities';
import { DocumentStore } from './document-store';
import { MongoDocumentStore } from './mongo-document-store.service';
import { APP_DEFAULTS } from '../config/app.config';

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'mongodb',
        url: configService.get<string>('DATABASE_URL', APP_DEFAULTS.databaseUrl),
        database: configService.get<string>(
          'DATABASE_NAME',
          APP_DEFAULTS.databaseName,
        ),
        entities: DOCUMENT_ENTITIES,
        // MongoDocumentStore connects lazily so the API can boot without the database
        manualInitialization: true,
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [{ provide: DocumentStore, useClass: MongoDocumentStore }],
  exports: [DocumentStore],
})
export class DatabaseModule {}
