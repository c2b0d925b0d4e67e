import { BadRequestException, CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Request } from 'express';
import { Observable, map } from 'rxjs';
import { EncryptionService } from './encryption.service';

export const ENCRYPTED_HEADER = 'x-encrypted';

export interface EncryptedEnvelope {
    payload: string;
}

export function isEnvelope(value: unknown): value is EncryptedEnvelope {
    return typeof value === 'object' && value !== null && 'payload' in value && typeof value.payload === 'string';
}

/**
 * With `X-Encrypted: true` the body arrives as `{ payload }` and is decrypted
 * before validation; the response leaves in the same envelope.
 */
@Injectable()
export class EncryptionInterceptor implements NestInterceptor {
    constructor(private readonly encryptionService: EncryptionService) {}

    intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
        const request = context.switchToHttp().getRequest<Request>();
        if (String(request.headers[ENCRYPTED_HEADER] ?? '').toLowerCase() !== 'true') {
            return next.handle();
        }
        if (!this.encryptionService.enabled) {
            throw new BadRequestException('Encryption is not configured. Set ENCRYPTION_KEY in the environment.');
        }

        if (request.method !== 'GET' && request.method !== 'DELETE') {
            if (!isEnvelope(request.body)) {
                throw new BadRequestException('Encrypted requests must send { "payload": "<base64>" }');
            }
            request.body = this.encryptionService.decrypt(request.body.payload);
        }

        return next.handle().pipe(
            map((data): EncryptedEnvelope => ({ payload: this.encryptionService.encrypt(data) })),
        );
    }
}
