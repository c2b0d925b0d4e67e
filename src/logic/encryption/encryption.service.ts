import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { AppConfig } from '../../config/configuration';
import { describeError } from '../../utils/errors';

const ALGORITHM = 'aes-256-gcm';
const NONCE_BYTES = 12;
const TAG_BYTES = 16;

/**
 * AES-256-GCM envelope for JSON bodies: base64(nonce ‖ ciphertext ‖ tag).
 */
@Injectable()
export class EncryptionService {
    private readonly logger = new Logger(EncryptionService.name);
    private readonly key?: Buffer;

    constructor(configService: ConfigService<AppConfig, true>) {
        const hex = configService.get('ENCRYPTION_KEY', { infer: true });
        this.key = hex ? Buffer.from(hex, 'hex') : undefined;
    }

    get enabled(): boolean {
        return this.key !== undefined;
    }

    encrypt(data: unknown): string {
        const key = this.requireKey();
        const nonce = randomBytes(NONCE_BYTES);
        const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_BYTES });
        const ciphertext = Buffer.concat([cipher.update(JSON.stringify(data), 'utf8'), cipher.final()]);
        return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]).toString('base64');
    }

    decrypt(payload: string): unknown {
        const key = this.requireKey();
        const combined = Buffer.from(payload, 'base64');
        if (combined.length < NONCE_BYTES + TAG_BYTES) {
            throw new BadRequestException('Invalid encrypted data: too short.');
        }

        const nonce = combined.subarray(0, NONCE_BYTES);
        const tag = combined.subarray(combined.length - TAG_BYTES);
        const ciphertext = combined.subarray(NONCE_BYTES, combined.length - TAG_BYTES);
        try {
            const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_BYTES });
            decipher.setAuthTag(tag);
            const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
            const parsed: unknown = JSON.parse(plaintext);
            return parsed;
        } catch (error) {
            this.logger.warn(`Decryption failed: ${describeError(error)}`);
            throw new BadRequestException('Decryption failed. Invalid data or key.');
        }
    }

    private requireKey(): Buffer {
        if (!this.key) {
            throw new BadRequestException('Encryption is not configured. Set ENCRYPTION_KEY in the environment.');
        }
        return this.key;
    }
}
