import { Injectable } from '@nestjs/common';
import {
  DocumentStore,
  PublicDocument,
  toPublic,
} from '../database/document-store';
import { Video } from '../database/entities/video.entity';
import { CreateVideoDto } from './dto/create-video.dto';

@Injectable()
export class VideosService {
  constructor(private readonly store: DocumentStore) {}

  async create(dto: CreateVideoDto): Promise<{ video_id: string }> {
    const videoId = await this.store.createDocument(Video, {
      user_id: dto.user_id,
      title: dto.title,
      subject: dto.subject ?? null,
      url: dto.url,
    });
    return { video_id: videoId };
  }

  async listForUser(userId: string): Promise<PublicDocument<Video>[]> {
    const videos = await this.store.getDocuments(Video, { user_id: userId });
    return videos.map(toPublic);
  }
}
