import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { VideosService } from './videos.service';
import { CreateVideoDto } from './dto/create-video.dto';

@Controller('videos')
export class VideosController {
  constructor(private readonly videosService: VideosService) {}

  @Post()
  create(@Body() dto: CreateVideoDto) {
    return this.videosService.create(dto);
  }

  @Get(':user_id')
  list(@Param('user_id') userId: string) {
    return this.videosService.listForUser(userId);
  }
}
