import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { MaterialsModule } from './materials/materials.module';
import { VideosModule } from './videos/videos.module';
import { EmotionsModule } from './emotions/emotions.module';
import { AdaptModule } from './adapt/adapt.module';
import { ChatModule } from './chat/chat.module';
import { HealthModule } from './health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    DatabaseModule,
    AuthModule,
    MaterialsModule,
    VideosModule,
    EmotionsModule,
    AdaptModule,
    ChatModule,
    HealthModule,
  ],
})
export class AppModule {}
