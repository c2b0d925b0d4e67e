import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { AppConfig } from '../../../config/configuration';
import { TokenClaims } from '../dto/auth.dto';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
    constructor(configService: ConfigService<AppConfig, true>) {
        const secret = configService.get('JWT_SECRET_KEY', { infer: true });
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            algorithms: [configService.get('JWT_ALGORITHM', { infer: true })],
            // Resolved per request so the app still starts without a secret; every call is then refused.
            secretOrKeyProvider: (_request: unknown, _rawToken: unknown, done: (err: unknown, secret?: string) => void) => {
                if (secret) {
                    done(null, secret);
                } else {
                    done(new UnauthorizedException('JWT authentication is not configured. Set JWT_SECRET_KEY in the environment.'));
                }
            },
        });
    }

    validate(payload: TokenClaims): TokenClaims {
        if (typeof payload.sub !== 'string' || payload.sub === '') {
            throw new UnauthorizedException('Invalid or expired token.');
        }
        return payload;
    }
}
