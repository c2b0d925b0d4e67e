import { Injectable, InternalServerErrorException, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { AppConfig } from '../../config/configuration';
import { TokenResponse } from './dto/auth.dto';

const LOOPBACK_ADDRESSES = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1']);

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);

    constructor(
        private readonly jwtService: JwtService,
        private readonly configService: ConfigService<AppConfig, true>,
    ) {}

    /** Leftmost X-Forwarded-For entry when present, else the socket address. */
    resolveClientIp(forwardedFor: string | string[] | undefined, remoteAddress: string | undefined): string {
        const header = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
        const first = header?.split(',')[0]?.trim();
        return first || remoteAddress || '';
    }

    isAuthorizedIp(ip: string): boolean {
        return LOOPBACK_ADDRESSES.has(ip) || this.configService.get('AUTHORIZED_TOKEN_IPS', { infer: true }).includes(ip);
    }

    /** Returns the user id when it is on the approved list. */
    assertApprovedUser(userId: string | undefined): string {
        if (!userId) {
            throw new UnauthorizedException('Missing required header: X-User-ID');
        }
        const approved = this.configService.get('APPROVED_USER_IDS', { infer: true });
        if (approved.length === 0) {
            throw new UnauthorizedException('No approved users configured. Set APPROVED_USER_IDS in the environment.');
        }
        if (!approved.includes(userId)) {
            this.logger.warn(`Rejected request from unknown user '${userId}'`);
            throw new UnauthorizedException(`User ID '${userId}' is not authorised.`);
        }
        return userId;
    }

    async issueToken(userIdHeader: string | undefined, clientIp: string): Promise<TokenResponse> {
        if (!this.isAuthorizedIp(clientIp)) {
            this.logger.warn(`Token request denied for IP '${clientIp}' (not in authorised list)`);
            throw new UnauthorizedException(`IP address '${clientIp}' is not authorised to request a token.`);
        }
        const userId = this.assertApprovedUser(userIdHeader);

        const secret = this.configService.get('JWT_SECRET_KEY', { infer: true });
        if (!secret) {
            throw new InternalServerErrorException('JWT authentication is not configured. Set JWT_SECRET_KEY in the environment.');
        }

        const expiryHours = this.configService.get('JWT_EXPIRY_HOURS', { infer: true });
        const accessToken = await this.jwtService.signAsync(
            { sub: userId, iss: this.configService.get('JWT_ISSUER', { infer: true }) },
            {
                secret,
                algorithm: this.configService.get('JWT_ALGORITHM', { infer: true }),
                ...(expiryHours !== undefined ? { expiresIn: Math.round(expiryHours * 3600) } : {}),
            },
        );
        this.logger.log(`Issued token for user '${userId}'`);
        return { accessToken, tokenType: 'bearer' };
    }
}
