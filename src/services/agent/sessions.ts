import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AgentConfig } from '../../config/schema';
import { ConfigurationError, ProviderError, errorMessage } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Sessions' });

export const MISSING_API_KEY = 'OpenAI API key not configured. Please set OPENAI_API_KEY in environment.';
export const MISSING_AGENT_ID = 'Agent ID not configured. Please set OPENAI_AGENT_ID in environment.';

const SessionResponseSchema = z.object({
  id: z.string(),
  client_secret: z.string(),
});

export interface AgentSession {
  session_id: string;
  client_secret: string;
}

export interface CreateSessionOptions {
  userId?: string;
  metadata?: Record<string, unknown>;
}

// Remember at most this many issued secrets for refresh lookups
const MAX_TRACKED_SECRETS = 1000;

/**
 * Client for the hosted agent service's chat-session endpoint. The browser
 * widget connects with the returned client secret; the API key never leaves
 * the server.
 */
export class AgentSessionClient {
  private readonly baseUrl: string;
  private readonly issuedTo = new Map<string, string>();

  constructor(private readonly config: AgentConfig, private readonly http: AxiosInstance = axios.create()) {
    this.baseUrl = config.base_url.replace(/\/$/, '');
  }

  get agentId(): string {
    return this.config.agent_id;
  }

  get configured(): boolean {
    return Boolean(this.config.agent_id);
  }

  async createSession(options: CreateSessionOptions = {}): Promise<AgentSession> {
    const { api_key: apiKey, agent_id: agentId } = this.config;
    if (!apiKey) throw new ConfigurationError(MISSING_API_KEY);
    if (!agentId) throw new ConfigurationError(MISSING_AGENT_ID);

    const user = options.userId || `anonymous-${uuidv4()}`;
    const body: Record<string, unknown> = { workflow: { id: agentId }, user };
    if (options.metadata && Object.keys(options.metadata).length > 0) {
      body.metadata = options.metadata;
    }

    let data: unknown;
    try {
      const response = await this.http.post(`${this.baseUrl}/chatkit/sessions`, body, {
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
          'OpenAI-Beta': 'chatkit_beta=v1',
        },
        timeout: this.config.timeout_ms,
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      log.error(`Session request failed${status ? ` (HTTP ${status})` : ''}: ${errorMessage(error)}`);
      if (status === 401 || status === 403) {
        throw new ConfigurationError(`Agent service rejected the API key (HTTP ${status})`, { cause: error });
      }
      throw new ProviderError(`Agent session request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = SessionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('Invalid response format from agent service');
    }

    this.remember(parsed.data.client_secret, user);
    log.info(`Created session ${parsed.data.id} for ${user}`);
    return { session_id: parsed.data.id, client_secret: parsed.data.client_secret };
  }

  /** Issues a new session for whoever held `currentSecret`. Unknown secrets get a fresh anonymous user. */
  async refresh(currentSecret: string): Promise<AgentSession> {
    const userId = this.issuedTo.get(currentSecret);
    if (!userId) {
      log.debug('Refreshing an unknown client secret; starting an anonymous session');
    }
    const session = await this.createSession({ userId });
    this.issuedTo.delete(currentSecret);
    return session;
  }

  private remember(secret: string, user: string): void {
    this.issuedTo.set(secret, user);
    if (this.issuedTo.size > MAX_TRACKED_SECRETS) {
      const oldest = this.issuedTo.keys().next();
      if (!oldest.done) this.issuedTo.delete(oldest.value);
    }
  }
}
