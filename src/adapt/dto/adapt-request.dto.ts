import { IsOptional, IsString } from 'class-validator';

export class AdaptRequestDto {
  @IsString()
  user_id!: string;

  @IsOptional()
  @IsString()
  material_id?: string | null;

  @IsString()
  latest_emotion!: string;
}
