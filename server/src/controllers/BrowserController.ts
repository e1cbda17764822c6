import { Body, Get, JsonController, Param, Post } from 'routing-controllers';
import { IsIn, IsNotEmpty, IsOptional, IsString, IsUrl, MaxLength } from 'class-validator';
import { Service } from 'typedi';
import { BrowserService } from '../services/browser/BrowserService';
import { SessionStore } from '../services/session/SessionStore';
import { PROBE_KINDS, ProbeKind } from '../types/browser';
import { translateErrors } from './httpErrors';

class ProbeRequest {
    @IsOptional()
    @IsIn(PROBE_KINDS)
    probe?: ProbeKind;

    /** Page for the navigate step; the configured probe URL otherwise. */
    @IsOptional()
    @IsUrl({ require_protocol: true, require_tld: false })
    url?: string;
}

class EvaluateRequest {
    @IsString()
    @IsNotEmpty()
    @MaxLength(20_000)
    script!: string;
}

@Service()
@JsonController('/api/sessions/:sessionId/browser')
export class BrowserController {
    constructor(
        private readonly browserService: BrowserService,
        private readonly sessionStore: SessionStore,
    ) { }

    @Post('/start')
    start(@Param('sessionId') sessionId: string) {
        return translateErrors(() => {
            this.sessionStore.require(sessionId);
            return this.browserService.start(sessionId);
        });
    }

    @Post('/probe')
    probe(
        @Param('sessionId') sessionId: string,
        @Body({ required: false }) body?: ProbeRequest,
    ) {
        const probe = body?.probe ?? 'test';
        return translateErrors(async () => {
            this.sessionStore.require(sessionId);
            const events = await this.browserService.runProbe(sessionId, probe, { url: body?.url });
            return { probe, events, browser: this.browserService.info(sessionId) ?? null };
        });
    }

    @Post('/evaluate')
    evaluate(@Param('sessionId') sessionId: string, @Body() body: EvaluateRequest) {
        return translateErrors(async () => {
            this.sessionStore.require(sessionId);
            const result = await this.browserService.evaluate(sessionId, body.script);
            return { result: result ?? null };
        });
    }

    @Get('/logs')
    logs(@Param('sessionId') sessionId: string) {
        return translateErrors(() => {
            this.sessionStore.require(sessionId);
            return {
                browser: this.browserService.info(sessionId) ?? null,
                events: this.browserService.collectLogs(sessionId),
            };
        });
    }

    @Get('/summary')
    summary(@Param('sessionId') sessionId: string) {
        return translateErrors(() => {
            this.sessionStore.require(sessionId);
            return this.browserService.summarize(sessionId);
        });
    }

    @Post('/close')
    close(@Param('sessionId') sessionId: string) {
        return translateErrors(async () => {
            this.sessionStore.require(sessionId);
            return { browser: (await this.browserService.close(sessionId)) ?? null };
        });
    }
}
