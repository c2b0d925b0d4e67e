import { ExecutionContext, createParamDecorator } from '@nestjs/common';
import { Request } from 'express';
import { userIdHeader } from './guards/approved-user.guard';

/** The X-User-ID of the request; use behind ApprovedUserGuard. */
export const UserId = createParamDecorator((_data: unknown, context: ExecutionContext): string => {
    return userIdHeader(context.switchToHttp().getRequest<Request>()) ?? '';
});
