import { IsOptional, IsString } from 'class-validator';

export class CreateMaterialDto {
  @IsString()
  user_id!: string;

  @IsString()
  title!: string;

  @IsOptional()
  @IsString()
  subject?: string | null;

  @IsString()
  content!: string;
}
