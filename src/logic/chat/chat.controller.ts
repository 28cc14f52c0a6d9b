import { Body, Controller, Get, Headers, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ConversationTurn } from '../../entities';
import { AskResult } from '../../utils/types';
import { ChatService } from './chat.service';
import { AskDto } from './dto/ask.dto';

// The role header is set by the authenticating tier in front of this service.
@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post(':sessionId/ask')
    @HttpCode(HttpStatus.OK)
    ask(
        @Param('sessionId') sessionId: string,
        @Headers('x-user-role') role: string | undefined,
        @Body() body: AskDto,
    ): Promise<AskResult> {
        return this.chatService.ask(sessionId, role, body.utterance);
    }

    @Get(':sessionId/turns')
    getTurns(@Param('sessionId') sessionId: string): Promise<ConversationTurn[]> {
        return this.chatService.getSessionTurns(sessionId);
    }
}
