import { Injectable } from '@nestjs/common';
import { DocumentStore } from '../database/document-store';
import { EmotionLog } from '../database/entities/emotion-log.entity';
import { LogEmotionDto } from './dto/log-emotion.dto';
import { EmotionSummary, summarizeEmotions } from './emotion-summary';

@Injectable()
export class EmotionsService {
  constructor(private readonly store: DocumentStore) {}

  async log(dto: LogEmotionDto): Promise<{ log_id: string }> {
    const logId = await this.store.createDocument(EmotionLog, {
      user_id: dto.user_id,
      emotion: dto.emotion,
      note: dto.note ?? null,
    });
    return { log_id: logId };
  }

  async summary(userId: string): Promise<EmotionSummary> {
    const logs = await this.store.getDocuments(EmotionLog, {
      user_id: userId,
    });
    return summarizeEmotions(logs.map((l) => l.emotion));
  }
}
