import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { EncryptionInterceptor } from './encryption.interceptor';
import { EncryptionService } from './encryption.service';

@Global()
@Module({
    providers: [
        EncryptionService,
        { provide: APP_INTERCEPTOR, useClass: EncryptionInterceptor },
    ],
    exports: [EncryptionService],
})
export class EncryptionModule {}
