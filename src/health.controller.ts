import {
  Controller,
  Get,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentStore } from './database/document-store';
import { errorMessage } from './helpers/error-message';

export interface DatabaseDiagnostics {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

@Controller()
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly store: DocumentStore,
    private readonly configService: ConfigService,
  ) {}

  @Get()
  getRoot() {
    return { message: 'EduSense backend running' };
  }

  @Get('test')
  async getDiagnostics(): Promise<DatabaseDiagnostics> {
    const isSet = (key: string) =>
      this.configService.get<string>(key) ? '✅ Set' : '❌ Not Set';

    const response: DatabaseDiagnostics = {
      backend: '✅ Running',
      database: '✅ Available',
      database_url: isSet('DATABASE_URL'),
      database_name: isSet('DATABASE_NAME'),
      connection_status: 'Not Connected',
      collections: [],
    };

    try {
      const collections = await this.store.listCollections();
      response.collections = collections.slice(0, 10);
      response.database = '✅ Connected & Working';
      response.connection_status = 'Connected';
    } catch (e) {
      const reason = errorMessage(e).slice(0, 50);
      response.database = this.store.isConnected()
        ? `⚠️  Connected but Error: ${reason}`
        : `❌ Error: ${reason}`;
    }
    return response;
  }

  @Get('health')
  getHealth() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  @Get('health/db')
  async getDatabaseHealth() {
    try {
      await this.store.ping();
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
      };
    } catch (e) {
      this.logger.warn(`Database ping failed: ${errorMessage(e)}`);
      throw new ServiceUnavailableException('Database unavailable');
    }
  }
}
