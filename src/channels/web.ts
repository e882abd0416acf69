import express from 'express';
import http from 'http';
import path from 'path';
import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AppContext } from '../context';
import { ConfigurationError, errorMessage } from '../errors';
import { resolvePath } from '../utils/paths';
import logger, { logContext } from '../utils/logger';

const log = logger.child({ module: 'Web' });

const SessionRequestSchema = z.object({
  user_id: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const RefreshRequestSchema = z.object({
  currentClientSecret: z.string().min(1),
});

const ToolCallRequestSchema = z.object({
  tool_name: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

const AddDocumentRequestSchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
});

function invalidBody(error: z.ZodError): string {
  return `Invalid request body: ${error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ')}`;
}

// Configuration problems are reported as-is so operators see which variable is missing.
function sessionFailure(action: string, error: unknown): string {
  if (error instanceof ConfigurationError) return error.message;
  return `Failed to ${action} session: ${errorMessage(error)}`;
}

export class WebChannel {
  private app: express.Express;
  private server: http.Server;
  private staticDir: string;

  constructor(private ctx: AppContext) {
    this.staticDir = resolvePath(ctx.config.server.static_dir);
    this.app = express();
    this.server = http.createServer(this.app);
    this.setupRoutes();
  }

  get name(): string {
    return 'web';
  }

  /** Port actually bound; differs from the configured one when that is 0. */
  get port(): number {
    const address = this.server.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.ctx.config.server.port;
  }

  private setupRoutes() {
    this.app.use((req, res, next) => {
      const requestId = uuidv4();
      res.setHeader('X-Request-Id', requestId);
      logContext.run({ requestId }, () => {
        log.debug(`${req.method} ${req.path}`);
        next();
      });
    });

    this.app.use(express.json());
    this.app.use('/static', express.static(this.staticDir));

    this.app.get('/', (req, res) => {
      const indexPath = path.join(this.staticDir, 'index.html');
      if (fs.existsSync(indexPath)) {
        res.sendFile(indexPath);
      } else {
        res.status(404).json({ error: `index.html not found at ${indexPath}` });
      }
    });

    this.app.get('/health', (req, res) => {
      res.json({
        status: 'healthy',
        environment: this.ctx.config.environment,
        agent_configured: this.ctx.sessions.configured,
      });
    });

    // --- Agent sessions ---

    this.app.post('/api/chatkit/session', async (req, res) => {
      const body = SessionRequestSchema.safeParse(req.body ?? {});
      if (!body.success) {
        return res.status(400).json({ error: invalidBody(body.error) });
      }
      try {
        const session = await this.ctx.sessions.createSession({
          userId: body.data.user_id,
          metadata: body.data.metadata,
        });
        res.json({ ...session, agent_id: this.ctx.sessions.agentId });
      } catch (error) {
        log.error(`Session creation failed: ${errorMessage(error)}`);
        res.status(500).json({ error: sessionFailure('create', error) });
      }
    });

    this.app.post('/api/chatkit/start', async (req, res) => {
      try {
        const session = await this.ctx.sessions.createSession();
        res.json({ client_secret: session.client_secret });
      } catch (error) {
        log.error(`Session start failed: ${errorMessage(error)}`);
        res.status(500).json({ error: sessionFailure('start', error) });
      }
    });

    this.app.post('/api/chatkit/refresh', async (req, res) => {
      const body = RefreshRequestSchema.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ error: invalidBody(body.error) });
      }
      try {
        const session = await this.ctx.sessions.refresh(body.data.currentClientSecret);
        res.json({ client_secret: session.client_secret });
      } catch (error) {
        log.error(`Session refresh failed: ${errorMessage(error)}`);
        res.status(500).json({ error: sessionFailure('refresh', error) });
      }
    });

    // --- Tools (development and agent registration) ---

    this.app.get('/api/tools', (req, res) => {
      res.json(this.ctx.tools.getDefinitions());
    });

    this.app.post('/api/tools/test', async (req, res) => {
      const body = ToolCallRequestSchema.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ error: invalidBody(body.error) });
      }
      const { tool_name: toolName, parameters } = body.data;
      if (!this.ctx.tools.has(toolName)) {
        return res.status(400).json({
          error: `Unknown tool: ${toolName}. Available tools: ${this.ctx.tools.toolNames.join(', ')}`,
        });
      }
      try {
        const result = await this.ctx.tools.execute(toolName, parameters);
        res.json({ tool: toolName, result });
      } catch (error) {
        res.status(500).json({ error: `Tool execution failed: ${errorMessage(error)}` });
      }
    });

    // --- Knowledge base ---

    this.app.get('/api/knowledge-base/stats', async (req, res) => {
      try {
        res.json(await this.ctx.knowledgeBase.getStats());
      } catch (error) {
        log.error(`Failed to read knowledge base stats: ${errorMessage(error)}`);
        res.status(500).json({ error: `Knowledge base unavailable: ${errorMessage(error)}` });
      }
    });

    this.app.post('/api/knowledge-base/documents', async (req, res) => {
      const body = AddDocumentRequestSchema.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ error: invalidBody(body.error) });
      }
      let position: number;
      try {
        position = await this.ctx.knowledgeBase.addDocument(body.data.title, body.data.content);
      } catch (error) {
        log.error(`Failed to add document: ${errorMessage(error)}`);
        return res.status(500).json({ error: `Failed to add document: ${errorMessage(error)}` });
      }

      // The document is in memory from here on; a retry would add it twice.
      try {
        await this.ctx.knowledgeBase.save();
      } catch (error) {
        log.error(`Document at position ${position} added but not saved: ${errorMessage(error)}`);
        return res.status(500).json({
          error: `Document added at position ${position} but could not be saved: ${errorMessage(error)}`,
          position,
          saved: false,
        });
      }

      log.info(`Added document "${body.data.title}" at position ${position}`);
      res.status(201).json({ position, saved: true });
    });

    // Malformed JSON bodies surface here from express.json()
    this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) return next(err);
      const status = typeof err === 'object' && err !== null && 'status' in err && err.status === 400 ? 400 : 500;
      log.error(`Unhandled request error: ${errorMessage(err)}`);
      res.status(status).json({ error: status === 400 ? 'Invalid JSON body' : 'Internal server error' });
    });
  }

  async start(): Promise<void> {
    const { host, port } = this.ctx.config.server;
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        log.info(`Web Channel started at http://${host}:${this.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
