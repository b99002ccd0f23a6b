import { IsOptional, IsString } from 'class-validator';

export class LogEmotionDto {
  @IsString()
  user_id!: string;

  // free-form; conventionally happy | sad | angry | confused | neutral
  @IsString()
  emotion!: string;

  @IsOptional()
  @IsString()
  note?: string | null;
}
