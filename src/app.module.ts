import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { AppConfig, validateConfig } from './config/configuration';
import { ChatMessage } from './entities';
import { AuthModule } from './logic/auth/auth.module';
import { ChatModule } from './logic/chat/chat.module';
import { DocumentsModule } from './logic/documents/documents.module';
import { EncryptionModule } from './logic/encryption/encryption.module';
import { GeminiModule } from './logic/gemini/gemini.module';

export function typeOrmOptions(configService: ConfigService<AppConfig, true>): TypeOrmModuleOptions {
    const common = { entities: [ChatMessage], synchronize: true };
    if (configService.get('DB_TYPE', { infer: true }) === 'mysql') {
        return {
            ...common,
            type: 'mysql',
            host: configService.get('DB_HOST', { infer: true }),
            port: configService.get('DB_PORT', { infer: true }),
            username: configService.get('DB_USERNAME', { infer: true }),
            password: configService.get('DB_PASSWORD', { infer: true }),
            database: configService.get('DB_DATABASE', { infer: true }),
            timezone: 'Z',
        };
    }
    return {
        ...common,
        type: 'better-sqlite3',
        database: configService.get('CHAT_HISTORY_DB_PATH', { infer: true }),
    };
}

@Module({
    imports: [
        ConfigModule.forRoot({ isGlobal: true, validate: validateConfig }),
        TypeOrmModule.forRootAsync({
            useFactory: typeOrmOptions,
            inject: [ConfigService],
        }),
        AuthModule,
        GeminiModule,
        EncryptionModule,
        DocumentsModule,
        ChatModule,
    ],
    controllers: [AppController],
})
export class AppModule {}
