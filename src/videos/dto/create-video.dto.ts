import { IsOptional, IsString } from 'class-validator';

export class CreateVideoDto {
  @IsString()
  user_id!: string;

  @IsString()
  title!: string;

  @IsOptional()
  @IsString()
  subject?: string | null;

  // stored as given, no reachability check
  @IsString()
  url!: string;
}
