import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import { SchemaIds, SchemaValidator, type SchemaId } from '../contracts/schema-validator.js';
import { DatabaseClient } from '../db/connection.js';
import { AppError, AuthenticationError, NotFoundError, PayloadTooLargeError, RequestValidationError } from '../errors.js';
import { IngestionCoordinator } from '../ingest/coordinator.js';
import { parseTimestamp } from '../ingest/parser.js';
import type { SimulationMode } from '../ingest/simulator.js';
import { Metrics } from '../metrics/counter.js';
import { AccountStore } from '../store/accounts.js';
import type { AlertRecorder, ContactDirectory, HistoryStore, NewContact } from '../store/types.js';

export interface ApiServerDeps {
    port: number;
    uploadMaxBytes: number;
    database: DatabaseClient;
    validator: SchemaValidator;
    accounts: AccountStore;
    coordinator: IngestionCoordinator;
    history: HistoryStore;
    alerts: AlertRecorder;
    contacts: ContactDirectory;
    metrics: Metrics;
}

interface Reply {
    status: number;
    body?: unknown;
}

interface Credentials {
    email: string;
    password: string;
}

const JSON_BODY_LIMIT = 64 * 1024;
const RECENT_LIMIT = 50;
const EARLIEST = new Date('0000-01-01T00:00:00.000Z');
const LATEST = new Date('9999-12-31T23:59:59.999Z');
const CONTACT_PATH = /^\/contacts\/(\d+)$/;

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let tooLarge = false;

        req.on('data', (chunk: Buffer) => {
            if (tooLarge) return;
            size += chunk.length;
            if (size > limit) {
                tooLarge = true;
                reject(new PayloadTooLargeError(`Request body exceeds ${limit} bytes`));
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            if (!tooLarge) resolve(Buffer.concat(chunks));
        });
        req.on('error', reject);
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

export class ApiServer {
    private server: Server;

    constructor(private deps: ApiServerDeps) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: err }, 'Failed to write response');
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const url = new URL(req.url ?? '/', 'http://localhost');

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        let reply: Reply;
        try {
            reply = await this.route(method, url, req);
        } catch (err) {
            this.deps.metrics.incrementRequestsFailed();
            reply = this.errorReply(err, method, url.pathname);
        }

        if (reply.body === undefined) {
            res.writeHead(reply.status);
            res.end();
            return;
        }

        res.writeHead(reply.status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(reply.body));
    }

    private errorReply(err: unknown, method: string, path: string): Reply {
        if (err instanceof AppError) {
            logger.debug({ method, path, code: err.code, message: err.message }, 'Request rejected');
            const body: Record<string, unknown> = { error: err.code, message: err.message };
            if (err.details !== undefined) {
                body.details = err.details;
            }
            return { status: err.status, body };
        }

        logger.error({ method, path, error: err }, 'Request failed');
        return { status: 500, body: { error: 'internal_error', message: 'Internal server error' } };
    }

    private async route(method: string, url: URL, req: IncomingMessage): Promise<Reply> {
        const path = url.pathname;

        switch (`${method} ${path}`) {
            case 'GET /health':
                return this.handleHealth();
            case 'GET /metrics':
                return { status: 200, body: { ...this.deps.metrics.getCounters(), timestamp: new Date().toISOString() } };
            case 'POST /accounts':
                return this.handleRegister(req);
            case 'POST /sessions':
                return this.handleLogin(req);
            case 'DELETE /sessions':
                return this.handleLogout(req);
            case 'POST /uploads':
                return this.handleUpload(req);
            case 'POST /simulations':
                return this.handleSimulate(req);
            case 'GET /readings':
                return this.handleReadings(req, url);
            case 'GET /dashboard':
                return this.handleDashboard(req);
            case 'GET /contacts':
                return { status: 200, body: await this.deps.contacts.listContacts(await this.authenticate(req)) };
            case 'POST /contacts':
                return this.handleAddContact(req);
            case 'GET /alerts':
                return { status: 200, body: await this.deps.alerts.list(await this.authenticate(req), RECENT_LIMIT) };
            case 'POST /alerts':
                return this.handleManualAlert(req);
        }

        const contactMatch = CONTACT_PATH.exec(path);
        if (method === 'DELETE' && contactMatch) {
            return this.handleDeleteContact(req, Number(contactMatch[1]));
        }

        throw new NotFoundError(`No route for ${method} ${path}`);
    }

    private handleHealth(): Reply {
        const isDatabaseOpen = this.deps.database.isOpen();

        return {
            status: isDatabaseOpen ? 200 : 503,
            body: {
                status: isDatabaseOpen ? 'ok' : 'degraded',
                database: {
                    open: isDatabaseOpen,
                },
                timestamp: new Date().toISOString(),
            },
        };
    }

    private async handleRegister(req: IncomingMessage): Promise<Reply> {
        const { email, password } = this.credentials(await this.readJson(req, SchemaIds.credentials));
        const account = await this.deps.accounts.register(email, password);
        logger.info({ userId: account.id }, 'Account registered');
        return { status: 201, body: account };
    }

    private async handleLogin(req: IncomingMessage): Promise<Reply> {
        const { email, password } = this.credentials(await this.readJson(req, SchemaIds.credentials));
        const token = await this.deps.accounts.login(email, password);
        return { status: 201, body: { token } };
    }

    private async handleLogout(req: IncomingMessage): Promise<Reply> {
        await this.authenticate(req);
        await this.deps.accounts.logout(this.bearerToken(req));
        return { status: 204 };
    }

    private async handleUpload(req: IncomingMessage): Promise<Reply> {
        const userId = await this.authenticate(req);
        const body = await readBody(req, this.deps.uploadMaxBytes);
        const summary = await this.deps.coordinator.ingest(userId, body);
        return { status: 200, body: summary };
    }

    private async handleSimulate(req: IncomingMessage): Promise<Reply> {
        const userId = await this.authenticate(req);
        const body = await this.readJson(req, SchemaIds.simulation);
        const mode = this.simulationMode(body.mode);
        const result = await this.deps.coordinator.simulate(userId, mode);
        return { status: 201, body: result };
    }

    private async handleReadings(req: IncomingMessage, url: URL): Promise<Reply> {
        const userId = await this.authenticate(req);
        const from = this.queryInstant(url, 'from') ?? EARLIEST;
        const to = this.queryInstant(url, 'to') ?? LATEST;
        return { status: 200, body: await this.deps.history.queryRange(userId, from, to) };
    }

    private async handleDashboard(req: IncomingMessage): Promise<Reply> {
        const userId = await this.authenticate(req);
        const newestFirst = await this.deps.history.latest(userId, RECENT_LIMIT);

        return {
            status: 200,
            body: {
                latest: newestFirst[0] ?? null,
                recent: [...newestFirst].reverse(),
                contacts: await this.deps.contacts.listContacts(userId),
            },
        };
    }

    private async handleAddContact(req: IncomingMessage): Promise<Reply> {
        const userId = await this.authenticate(req);
        const body = await this.readJson(req, SchemaIds.contactCreate);
        const name = optionalString(body.name);
        if (name === undefined) {
            throw new RequestValidationError('Contact name is required');
        }

        const contact: NewContact = { name, phone: optionalString(body.phone), email: optionalString(body.email) };
        return { status: 201, body: await this.deps.contacts.addContact(userId, contact) };
    }

    private async handleDeleteContact(req: IncomingMessage, contactId: number): Promise<Reply> {
        const userId = await this.authenticate(req);
        const deleted = await this.deps.contacts.deleteContact(userId, contactId);
        if (!deleted) {
            throw new NotFoundError(`Contact ${contactId} not found`);
        }
        return { status: 204 };
    }

    private async handleManualAlert(req: IncomingMessage): Promise<Reply> {
        const userId = await this.authenticate(req);
        const body = await this.readJson(req, SchemaIds.alertCreate);
        const alert = await this.deps.coordinator.raiseManualAlert(userId, optionalString(body.location));
        return { status: 201, body: alert };
    }

    private bearerToken(req: IncomingMessage): string {
        const header = req.headers.authorization ?? '';
        return header.startsWith('Bearer ') ? header.slice(7).trim() : '';
    }

    private async authenticate(req: IncomingMessage): Promise<number> {
        const token = this.bearerToken(req);
        const userId = token ? await this.deps.accounts.resolveSession(token) : null;
        if (userId === null) {
            throw new AuthenticationError('Missing or invalid session token');
        }
        return userId;
    }

    /**
     * Read a JSON object body and check it against a request contract. An empty body
     * is read as `{}`.
     */
    private async readJson(req: IncomingMessage, schemaId: SchemaId): Promise<Record<string, unknown>> {
        const raw = (await readBody(req, JSON_BODY_LIMIT)).toString('utf-8').trim();

        let data: unknown = {};
        if (raw !== '') {
            try {
                data = JSON.parse(raw);
            } catch {
                throw new RequestValidationError('Request body is not valid JSON');
            }
        }

        const result = this.deps.validator.validate(schemaId, data);
        if (!result.valid || !isRecord(data)) {
            throw new RequestValidationError('Request body does not match the contract', result.errors);
        }

        return data;
    }

    private credentials(body: Record<string, unknown>): Credentials {
        const email = optionalString(body.email);
        const password = optionalString(body.password);
        if (email === undefined || password === undefined) {
            throw new RequestValidationError('Email and password are required');
        }
        return { email, password };
    }

    private simulationMode(value: unknown): SimulationMode {
        switch (value) {
            case undefined:
                return 'normal';
            case 'normal':
            case 'abnormal':
            case 'attack':
            case 'random':
                return value;
            default:
                throw new RequestValidationError(`Unknown simulation mode: ${String(value)}`);
        }
    }

    private queryInstant(url: URL, name: string): Date | undefined {
        const value = url.searchParams.get(name);
        if (value === null || value === '') return undefined;

        const instant = parseTimestamp(value);
        if (!instant) {
            throw new RequestValidationError(`Query parameter ${name} is not a valid timestamp`);
        }
        return instant;
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.deps.port, () => {
                logger.info({ port: this.getPort() }, 'HTTP API server started');
                resolve();
            });
        });
    }

    /**
     * Port actually bound; differs from the configured one when that was 0.
     */
    getPort(): number {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address.port : this.deps.port;
    }

    async stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
