import { Injectable } from '@nestjs/common';
import {
  DocumentStore,
  PublicDocument,
  toPublic,
} from '../database/document-store';
import { Material } from '../database/entities/material.entity';
import { CreateMaterialDto } from './dto/create-material.dto';

@Injectable()
export class MaterialsService {
  constructor(private readonly store: DocumentStore) {}

  async create(dto: CreateMaterialDto): Promise<{ material_id: string }> {
    const materialId = await this.store.createDocument(Material, {
      user_id: dto.user_id,
      title: dto.title,
      subject: dto.subject ?? null,
      content: dto.content,
      difficulty: 'normal',
    });
    return { material_id: materialId };
  }

  async listForUser(userId: string): Promise<PublicDocument<Material>[]> {
    const materials = await this.store.getDocuments(Material, {
      user_id: userId,
    });
    return materials.map(toPublic);
  }
}
