import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { AppConfig } from '../../config/configuration';
import { ChatMessage } from '../../entities';
import { StoreFailure, describeError } from '../../utils/errors';
import { KeyedLock } from '../../utils/keyed-lock';
import { ConversationTurn } from '../../utils/types';

const SHARED_LOCK_KEY = '*';

/**
 * Per-user conversation log capped at MAX_MESSAGES_PER_USER. Appends and the
 * eviction they cause commit together; writes for one user are serialized.
 */
@Injectable()
export class ChatHistoryService {
    private readonly logger = new Logger(ChatHistoryService.name);
    private readonly locks = new KeyedLock();
    private readonly maxMessages: number;
    private lastWrittenAt = 0;

    constructor(
        @InjectRepository(ChatMessage)
        private readonly messages: Repository<ChatMessage>,
        configService: ConfigService<AppConfig, true>,
    ) {
        this.maxMessages = configService.get('MAX_MESSAGES_PER_USER', { infer: true });
    }

    /** Oldest first, at most `limit` turns. */
    async getHistory(userId: string, limit = this.maxMessages): Promise<ConversationTurn[]> {
        try {
            const rows = await this.messages.find({
                where: { userId },
                order: { createdAt: 'DESC', id: 'DESC' },
                take: limit,
            });
            return rows.reverse().map(row => row.toTurn());
        } catch (error) {
            throw new StoreFailure('read', `Could not load history for user '${userId}': ${describeError(error)}`, error);
        }
    }

    async addMessages(userId: string, turns: ConversationTurn[]): Promise<void> {
        if (turns.length === 0) return;

        await this.locks.runExclusive(this.lockKey(userId), async () => {
            try {
                await this.messages.manager.transaction(async manager => {
                    const repository = manager.getRepository(ChatMessage);
                    // A batch shares one timestamp; ids order it. Never earlier than a previous batch.
                    this.lastWrittenAt = Math.max(Date.now(), this.lastWrittenAt);
                    const createdAt = new Date(this.lastWrittenAt);
                    const rows = turns.map(turn => repository.create({
                        userId,
                        role: turn.role,
                        content: turn.content,
                        createdAt,
                    }));
                    await repository.insert(rows);

                    const overflow = (await repository.count({ where: { userId } })) - this.maxMessages;
                    if (overflow > 0) {
                        const oldest = await repository.find({
                            select: { id: true },
                            where: { userId },
                            order: { createdAt: 'ASC', id: 'ASC' },
                            take: overflow,
                        });
                        await repository.delete({ id: In(oldest.map(row => row.id)) });
                        this.logger.log(`Evicted ${oldest.length} oldest message(s) for user '${userId}'`);
                    }
                });
            } catch (error) {
                throw new StoreFailure('write', `Could not save history for user '${userId}': ${describeError(error)}`, error);
            }
        });
    }

    /** Returns how many messages were deleted. */
    async clearHistory(userId: string): Promise<number> {
        return this.locks.runExclusive(this.lockKey(userId), async () => {
            try {
                const result = await this.messages.delete({ userId });
                const deleted = result.affected ?? 0;
                this.logger.log(`Cleared ${deleted} message(s) for user '${userId}'`);
                return deleted;
            } catch (error) {
                throw new StoreFailure('clear', `Could not clear history for user '${userId}': ${describeError(error)}`, error);
            }
        });
    }

    async getMessageCount(userId: string): Promise<number> {
        try {
            return await this.messages.count({ where: { userId } });
        } catch (error) {
            throw new StoreFailure('read', `Could not count messages for user '${userId}': ${describeError(error)}`, error);
        }
    }

    async listUsers(): Promise<string[]> {
        try {
            const rows = await this.messages
                .createQueryBuilder('message')
                .select('message.userId', 'userId')
                .distinct(true)
                .orderBy('message.userId', 'ASC')
                .getRawMany<{ userId: string }>();
            return rows.map(row => row.userId);
        } catch (error) {
            throw new StoreFailure('read', `Could not list users: ${describeError(error)}`, error);
        }
    }

    // The sqlite drivers share one connection, so their writes take a single lock.
    private lockKey(userId: string): string {
        const driver = this.messages.manager.connection.options.type;
        return driver === 'better-sqlite3' || driver === 'sqlite' ? SHARED_LOCK_KEY : userId;
    }
}
