import { Module } from '@nestjs/common';
import { AdaptController } from './adapt.controller';
import { AdaptService } from './adapt.service';

@Module({
  controllers: [AdaptController],
  providers: [AdaptService],
})
export class AdaptModule {}
