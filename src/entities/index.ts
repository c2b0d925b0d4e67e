export { ChatMessage } from './chat-message.entity';
