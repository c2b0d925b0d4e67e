import { Global, Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';
import { ApprovedUserGuard } from './guards/approved-user.guard';

@Global()
@Module({
    imports: [PassportModule, JwtModule.register({})],
    providers: [AuthService, JwtStrategy, ApprovedUserGuard],
    controllers: [AuthController],
    exports: [AuthService, ApprovedUserGuard],
})
export class AuthModule {}
