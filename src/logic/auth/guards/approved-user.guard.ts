import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Request } from 'express';
import { AuthService } from '../auth.service';

export const USER_ID_HEADER = 'x-user-id';

export function userIdHeader(request: Request): string | undefined {
    const value = request.headers[USER_ID_HEADER];
    return Array.isArray(value) ? value[0] : value;
}

/** Runs after JwtAuthGuard: the X-User-ID header must name an approved user. */
@Injectable()
export class ApprovedUserGuard implements CanActivate {
    constructor(private readonly authService: AuthService) {}

    canActivate(context: ExecutionContext): boolean {
        const request = context.switchToHttp().getRequest<Request>();
        this.authService.assertApprovedUser(userIdHeader(request));
        return true;
    }
}
