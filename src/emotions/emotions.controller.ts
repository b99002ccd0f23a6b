import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { EmotionsService } from './emotions.service';
import { LogEmotionDto } from './dto/log-emotion.dto';

@Controller('emotions')
export class EmotionsController {
  constructor(private readonly emotionsService: EmotionsService) {}

  @Post()
  log(@Body() dto: LogEmotionDto) {
    return this.emotionsService.log(dto);
  }

  @Get('summary/:user_id')
  summary(@Param('user_id') userId: string) {
    return this.emotionsService.summary(userId);
  }
}
