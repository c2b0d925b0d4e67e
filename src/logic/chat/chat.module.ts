import { Module } from '@nestjs/common';
import { AgentModule } from '../agent/agent.module';
import { ChatHistoryModule } from '../chat-history/chat-history.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

@Module({
    imports: [AgentModule, ChatHistoryModule],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
