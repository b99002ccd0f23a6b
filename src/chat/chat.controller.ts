import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ConversationService } from './conversation.service';
import { ChatRequestDto } from './dto/chat-request.dto';

@Controller('chat')
export class ChatController {
  constructor(private readonly conversationService: ConversationService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  chat(@Body() dto: ChatRequestDto): Promise<{ reply: string }> {
    return this.conversationService.reply(dto);
  }
}
