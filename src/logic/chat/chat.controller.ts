import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post, Query, Res, UseGuards } from '@nestjs/common';
import { Response } from 'express';
import { ApprovedUserGuard } from '../auth/guards/approved-user.guard';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { UserId } from '../auth/user-id.decorator';
import { ChatService } from './chat.service';
import {
    AnalyzeRequestDto,
    AnalyzeResponse,
    ClearHistoryResponse,
    HistoryResponse,
    QueryRequestDto,
    QueryResponse,
    StatelessQueryDto,
} from './dto/chat.dto';

/** Fires when the client hangs up before the response is written. */
function disconnectSignal(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) controller.abort();
    });
    return controller.signal;
}

@Controller()
@UseGuards(JwtAuthGuard)
export class ChatController {
    constructor(private readonly chatService: ChatService) {}

    @Get('models')
    async models(): Promise<{ models: string[] }> {
        return this.chatService.listModels();
    }

    @Post('query')
    @HttpCode(HttpStatus.OK)
    @UseGuards(ApprovedUserGuard)
    async query(
        @UserId() userId: string,
        @Body() body: QueryRequestDto,
        @Res({ passthrough: true }) res: Response,
    ): Promise<QueryResponse> {
        return this.chatService.query(userId, body, disconnectSignal(res));
    }

    @Get('query')
    @UseGuards(ApprovedUserGuard)
    async queryStateless(
        @UserId() userId: string,
        @Query() params: StatelessQueryDto,
        @Res({ passthrough: true }) res: Response,
    ): Promise<QueryResponse> {
        return this.chatService.queryStateless(userId, params, disconnectSignal(res));
    }

    @Get('history')
    @UseGuards(ApprovedUserGuard)
    async history(@UserId() userId: string): Promise<HistoryResponse> {
        return this.chatService.getHistory(userId);
    }

    @Delete('history')
    @UseGuards(ApprovedUserGuard)
    async clearHistory(@UserId() userId: string): Promise<ClearHistoryResponse> {
        return this.chatService.clearHistory(userId);
    }

    @Post('analyze')
    @HttpCode(HttpStatus.OK)
    @UseGuards(ApprovedUserGuard)
    async analyze(
        @UserId() userId: string,
        @Body() body: AnalyzeRequestDto,
        @Res({ passthrough: true }) res: Response,
    ): Promise<AnalyzeResponse> {
        return this.chatService.analyze(userId, body, disconnectSignal(res));
    }
}
