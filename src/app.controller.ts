import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
    @Get('health')
    health(): { status: 'healthy' } {
        return { status: 'healthy' };
    }
}
