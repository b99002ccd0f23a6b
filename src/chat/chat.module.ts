import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { ChatController } from './chat.controller';
import { ConversationService } from './conversation.service';

@Module({
  imports: [AiModule],
  controllers: [ChatController],
  providers: [ConversationService],
})
export class ChatModule {}
