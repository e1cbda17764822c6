import { Request, Response } from 'express';
import { Service } from 'typedi';
import { OutboundEvent, StatusEvent } from '../types/events';
import { createLogger } from '../utils/logger';

interface SseClient {
    id: number;
    sessionId: string;
    response: Response;
    heartbeat: NodeJS.Timeout;
}

const KEEP_ALIVE_MS = 25000;

/** Per-session Server-Sent-Events channels. Publishing never fails the caller. */
@Service()
export class SseService {
    private readonly logger = createLogger('SseService');
    private readonly clients = new Map<number, SseClient>();

    private nextClientId = 1;

    addClient(sessionId: string, request: Request, response: Response): void {
        response.setHeader('Content-Type', 'text/event-stream');
        response.setHeader('Cache-Control', 'no-cache');
        response.setHeader('Connection', 'keep-alive');
        response.flushHeaders?.();
        response.write('retry: 5000\n\n');

        const client: SseClient = {
            id: this.nextClientId++,
            sessionId,
            response,
            heartbeat: setInterval(() => {
                this.pushRaw(client.id, ': keep-alive\n\n');
            }, KEEP_ALIVE_MS),
        };

        this.clients.set(client.id, client);
        this.logger.debug('SSE client connected', { sessionId, clientId: client.id });

        const closeHandler = () => {
            this.removeClient(client.id);
            request.removeListener('close', closeHandler);
        };

        request.on('close', closeHandler);
    }

    publish(sessionId: string, event: OutboundEvent): void {
        const serialized = JSON.stringify(event);
        for (const client of this.clients.values()) {
            if (client.sessionId !== sessionId) {
                continue;
            }
            this.pushRaw(client.id, `event: ${event.type}\ndata: ${serialized}\n\n`);
        }
    }

    publishStatus(sessionId: string, status: Omit<StatusEvent, 'type'>): void {
        this.publish(sessionId, { type: 'status', ...status });
    }

    clientCount(sessionId: string): number {
        let count = 0;
        for (const client of this.clients.values()) {
            if (client.sessionId === sessionId) {
                count += 1;
            }
        }
        return count;
    }

    /** Ends every channel of the session. */
    closeSession(sessionId: string): void {
        for (const client of [...this.clients.values()]) {
            if (client.sessionId === sessionId) {
                this.removeClient(client.id);
            }
        }
    }

    closeAll(): void {
        for (const clientId of [...this.clients.keys()]) {
            this.removeClient(clientId);
        }
    }

    private pushRaw(clientId: number, chunk: string): void {
        const client = this.clients.get(clientId);
        if (!client) {
            return;
        }

        try {
            client.response.write(chunk);
        } catch (error) {
            this.logger.warn('Failed to push SSE chunk, removing client', {
                sessionId: client.sessionId,
                clientId,
                error,
            });
            this.removeClient(clientId);
        }
    }

    private removeClient(clientId: number): void {
        const client = this.clients.get(clientId);
        if (!client) {
            return;
        }

        clearInterval(client.heartbeat);
        this.clients.delete(clientId);
        try {
            client.response.end();
        } catch (error) {
            this.logger.warn('Failed to close SSE response', { clientId, error });
        }
    }
}
