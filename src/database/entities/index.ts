import { User } from './user.entity';
import { Material } from './material.entity';
import { Video } from './video.entity';
import { EmotionLog } from './emotion-log.entity';
import { ChatMessage } from './chat-message.entity';

export const DOCUMENT_ENTITIES = [User, Material, Video, EmotionLog, ChatMessage];
