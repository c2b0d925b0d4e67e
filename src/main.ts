import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';

async function bootstrap() {
    const app = await NestFactory.create(AppModule);
    const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);

    const origins = configService.get('CORS_ORIGIN', { infer: true });
    app.enableCors({
        origin: origins.length > 0 ? origins : '*',
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-User-ID', 'X-Encrypted', 'Accept'],
        optionsSuccessStatus: 200,
    });
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    app.enableShutdownHooks();

    const port = configService.get('PORT', { infer: true });
    await app.listen(port);
    Logger.log(`Listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
    Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
    process.exit(1);
});
