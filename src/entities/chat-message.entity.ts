import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { ConversationTurn, isRole } from '../utils/types';

@Entity('chat_messages')
@Index(['userId', 'createdAt', 'id'])
export class ChatMessage {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 256 })
  userId!: string;

  @Column({ type: 'varchar', length: 16 })
  role!: string; // 'user' | 'assistant'

  @Column('text')
  content!: string;

  // UTC; written explicitly so ordering never depends on the database clock
  @Column({ type: 'datetime' })
  createdAt!: Date;

  toTurn(): ConversationTurn {
    return {
      role: isRole(this.role) ? this.role : 'user',
      content: this.content,
    };
  }
}
