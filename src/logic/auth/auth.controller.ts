import { Controller, HttpCode, HttpStatus, Post, Req } from '@nestjs/common';
import { Request } from 'express';
import { AuthService } from './auth.service';
import { TokenResponse } from './dto/auth.dto';
import { userIdHeader } from './guards/approved-user.guard';

@Controller()
export class AuthController {
    constructor(private readonly authService: AuthService) {}

    @Post('token')
    @HttpCode(HttpStatus.OK)
    async token(@Req() req: Request): Promise<TokenResponse> {
        const clientIp = this.authService.resolveClientIp(req.headers['x-forwarded-for'], req.socket.remoteAddress);
        return this.authService.issueToken(userIdHeader(req), clientIp);
    }
}
