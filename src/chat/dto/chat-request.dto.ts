import { IsOptional, IsString } from 'class-validator';

export class ChatRequestDto {
  @IsString()
  user_id!: string;

  @IsString()
  message!: string;

  @IsOptional()
  @IsString()
  emotion_hint?: string | null;
}
