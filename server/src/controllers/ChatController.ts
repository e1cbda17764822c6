import {
    BadRequestError,
    Body,
    Delete,
    Get,
    HttpCode,
    JsonController,
    NotFoundError,
    Param,
    Post,
    Put,
    Req,
    Res,
    UseBefore,
} from 'routing-controllers';
import express, { Request, Response } from 'express';
import archiver from 'archiver';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Service } from 'typedi';
import path from 'node:path';
import { ChatService } from '../services/ChatService';
import { SseService } from '../services/SseService';
import { BrowserService } from '../services/browser/BrowserService';
import { SessionStore } from '../services/session/SessionStore';
import {
    WorkspaceStore,
    normalizeRelativePath,
} from '../services/workspace/WorkspaceStore';
import { SessionData } from '../types/chat';
import { OutboundEvent } from '../types/events';
import { serializeMessage } from '../utils/chat';
import { createLogger } from '../utils/logger';
import { translateErrors } from './httpErrors';

class CreateSessionRequest {
    @IsOptional()
    @IsString()
    @MaxLength(200)
    title?: string;
}

class ChatRequest {
    @IsString()
    @IsNotEmpty()
    message!: string;
}

const CONTENT_TYPES: Record<string, string> = {
    '.html': 'text/html; charset=utf-8',
    '.css': 'text/css; charset=utf-8',
    '.js': 'application/javascript; charset=utf-8',
    '.json': 'application/json; charset=utf-8',
    '.md': 'text/markdown; charset=utf-8',
};

@Service()
@JsonController('/api/sessions')
export class ChatController {
    private readonly logger = createLogger('ChatController');

    constructor(
        private readonly chatService: ChatService,
        private readonly sessionStore: SessionStore,
        private readonly workspaceStore: WorkspaceStore,
        private readonly browserService: BrowserService,
        private readonly sseService: SseService,
    ) { }

    @Post('/')
    @HttpCode(201)
    createSession(@Body({ required: false }) body?: CreateSessionRequest) {
        const session = this.sessionStore.create(body?.title);
        this.workspaceStore.initialize(session.id);
        return this.describeSession(session);
    }

    @Get('/')
    listSessions() {
        return this.sessionStore.list().map((session) => ({
            id: session.id,
            title: session.title,
            createdAt: session.createdAt.toISOString(),
            updatedAt: session.updatedAt.toISOString(),
            extension: session.extension ?? null,
        }));
    }

    @Get('/:sessionId')
    getSession(@Param('sessionId') sessionId: string) {
        return translateErrors(() => this.describeSession(this.sessionStore.require(sessionId)));
    }

    @Delete('/:sessionId')
    async deleteSession(@Param('sessionId') sessionId: string) {
        await translateErrors(() => this.chatService.discardSession(sessionId));
        return { message: 'Session deleted' };
    }

    @Get('/:sessionId/events')
    stream(
        @Param('sessionId') sessionId: string,
        @Req() request: Request,
        @Res() response: Response,
    ): Response {
        if (!this.sessionStore.has(sessionId)) {
            throw new NotFoundError(`Session ${sessionId} not found`);
        }
        this.sseService.addClient(sessionId, request, response);
        return response;
    }

    @Post('/:sessionId/messages')
    async sendMessage(
        @Param('sessionId') sessionId: string,
        @Body() body: ChatRequest,
    ): Promise<{ events: OutboundEvent[] }> {
        const events = await translateErrors(() =>
            this.chatService.handleUserMessage(sessionId, body.message),
        );
        return { events };
    }

    @Get('/:sessionId/files')
    listFiles(@Param('sessionId') sessionId: string) {
        return translateErrors(() => {
            this.sessionStore.require(sessionId);
            const workspace = this.workspaceStore.initialize(sessionId);
            return { files: this.workspaceStore.read(workspace) };
        });
    }

    @Get('/:sessionId/files/*')
    async getFile(
        @Param('sessionId') sessionId: string,
        @Req() request: Request,
        @Res() response: Response,
    ) {
        const content = await translateErrors(() => {
            this.sessionStore.require(sessionId);
            const filePath = normalizeRelativePath(request.params['0'] ?? '');
            const workspace = this.workspaceStore.initialize(sessionId);
            const files = this.workspaceStore.read(workspace);
            if (!(filePath in files)) {
                throw new NotFoundError(`File ${filePath} not found`);
            }
            response.setHeader(
                'Content-Type',
                CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'text/plain; charset=utf-8',
            );
            return files[filePath];
        });
        return response.send(content);
    }

    @Put('/:sessionId/files/*')
    @UseBefore(express.text({ type: () => true, limit: '2mb' }))
    updateFile(@Param('sessionId') sessionId: string, @Req() request: Request) {
        const body: unknown = request.body;
        if (typeof body !== 'string') {
            throw new BadRequestError('Request body must be the file content as text');
        }
        return translateErrors(() =>
            this.chatService.updateFile(sessionId, request.params['0'] ?? '', body),
        );
    }

    @Get('/:sessionId/extension/archive')
    async downloadArchive(
        @Param('sessionId') sessionId: string,
        @Res() response: Response,
    ) {
        const session = await translateErrors(() => this.sessionStore.require(sessionId));
        const workspace = this.workspaceStore.initialize(sessionId);
        if (this.workspaceStore.listFiles(workspace).length === 0) {
            throw new NotFoundError('The session has no extension yet');
        }

        const archive = archiver('zip', { zlib: { level: 9 } });

        archive.on('error', (error) => {
            this.logger.error('Failed to stream extension archive', {
                sessionId,
                error: error.message,
            });
            if (!response.headersSent) {
                response.status(500).json({ message: 'Failed to build the archive' });
            } else {
                response.end();
            }
            archive.abort();
        });

        const fileName = (session.extension?.name ?? 'extension')
            .replace(/[^a-zA-Z0-9-_]+/g, '-')
            .replace(/^-+|-+$/g, '') || 'extension';
        response.setHeader('Content-Type', 'application/zip');
        response.setHeader('Content-Disposition', `attachment; filename="${fileName}.zip"`);

        archive.pipe(response);
        archive.directory(workspace.extensionDir, false);
        archive.finalize().catch((error: unknown) => {
            this.logger.error('Failed to finalize extension archive', { sessionId, error });
        });
        return response;
    }

    private describeSession(session: SessionData) {
        const workspace = this.workspaceStore.initialize(session.id);
        return {
            id: session.id,
            title: session.title,
            createdAt: session.createdAt.toISOString(),
            updatedAt: session.updatedAt.toISOString(),
            messages: session.messages.map(serializeMessage),
            extension: session.extension
                ? {
                    ...session.extension,
                    fileList: this.workspaceStore.listFiles(workspace),
                }
                : null,
            browser: this.browserService.info(session.id) ?? null,
            generating: this.chatService.isGenerating(session.id),
        };
    }
}
