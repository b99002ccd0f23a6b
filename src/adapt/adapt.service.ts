import { Injectable, Logger } from '@nestjs/common';
import {
  DocumentStore,
  PublicDocument,
  toPublic,
} from '../database/document-store';
import { Material } from '../database/entities/material.entity';
import { errorMessage } from '../helpers/error-message';
import { AdaptRequestDto } from './dto/adapt-request.dto';
import {
  AdaptationPolicy,
  lookupPolicy,
  suggestedIntro,
} from './policy-table';

export interface AdaptResponse {
  policy: AdaptationPolicy;
  material: PublicDocument<Material> | null;
  suggested_intro?: string;
}

@Injectable()
export class AdaptService {
  private readonly logger = new Logger(AdaptService.name);

  constructor(private readonly store: DocumentStore) {}

  async adapt(dto: AdaptRequestDto): Promise<AdaptResponse> {
    const policy = lookupPolicy(dto.latest_emotion);
    const material = dto.material_id
      ? await this.findMaterial(dto.material_id)
      : null;

    const response: AdaptResponse = {
      policy,
      material: material ? toPublic(material) : null,
    };
    if (material) {
      response.suggested_intro = suggestedIntro(policy);
    }
    return response;
  }

  // Any lookup failure means "no material"; the request itself never fails here.
  private async findMaterial(materialId: string): Promise<Material | null> {
    try {
      return await this.store.findById(Material, materialId);
    } catch (e) {
      this.logger.warn(
        `Material lookup failed for "${materialId}": ${errorMessage(e)}`,
      );
      return null;
    }
  }
}
