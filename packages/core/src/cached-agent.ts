import {
  NotFoundError,
  ValidationError,
  type FeedbackSummary,
  type TokenCounts,
} from '@qmem/shared';
import type { QueryMemoryCache } from './query-memory-cache.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { parseRating } from './feedback.js';

export interface AgentAnswer {
  response: string;
  toolsUsed?: string[];
  context?: Record<string, unknown>;
  tokenCounts?: TokenCounts;
}

export interface AgentRunContext {
  sessionId?: string;
}

/** The expensive pipeline the cache sits in front of (LLM agent + MCP tools). */
export interface AgentRunner {
  run(query: string, context: AgentRunContext): Promise<AgentAnswer>;
}

export interface AskResult {
  response: string;
  source: 'cache' | 'agent';
  toolsUsed: string[];
}

const DEFAULT_SESSION = 'default';

/**
 * Puts the query cache in front of an agent. Caching is an optimization only:
 * any cache failure is logged and the agent answer is returned regardless.
 * Pass `null` as the cache to run cache-less (e.g. after a failed migration).
 *
 * The last query of every session is kept until `forgetSession` is called;
 * callers that open many sessions end them through it.
 */
export class CachedAgent {
  private readonly lastQueries = new Map<string, string>();
  private readonly logger: Logger;

  constructor(
    private readonly cache: QueryMemoryCache | null,
    private readonly agent: AgentRunner,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger();
  }

  get cachingEnabled(): boolean {
    return this.cache !== null;
  }

  async ask(query: string, context: AgentRunContext = {}): Promise<AskResult> {
    this.lastQueries.set(context.sessionId ?? DEFAULT_SESSION, query);

    if (this.cache) {
      try {
        const cached = await this.cache.lookup(query, { sessionId: context.sessionId });
        if (cached.hit) {
          return { response: cached.responseText, source: 'cache', toolsUsed: cached.entry.toolsUsed };
        }
      } catch (err) {
        this.logger.warn({ err }, 'cache lookup failed, running agent');
      }
    }

    const answer = await this.agent.run(query, context);
    const toolsUsed = answer.toolsUsed ?? [];

    if (this.cache) {
      try {
        await this.cache.record(query, answer.response, toolsUsed, {
          context: answer.context,
          tokenCounts: answer.tokenCounts,
        });
      } catch (err) {
        this.logger.warn({ err }, 'failed to cache agent answer');
      }
    }

    return { response: answer.response, source: 'agent', toolsUsed };
  }

  /** Most recent query asked in the session, if any. */
  lastQuery(sessionId: string = DEFAULT_SESSION): string | undefined {
    return this.lastQueries.get(sessionId);
  }

  /** Drop what is remembered about a finished session. */
  forgetSession(sessionId: string = DEFAULT_SESSION): boolean {
    return this.lastQueries.delete(sessionId);
  }

  /**
   * Rate the session's most recent answer. Returns null when there is nothing
   * to rate or the cache could not take the vote; throws ValidationError for
   * a malformed rating.
   */
  async rate(rating: string, sessionId: string = DEFAULT_SESSION): Promise<FeedbackSummary | null> {
    const parsed = parseRating(rating);
    const query = this.lastQueries.get(sessionId);
    if (!this.cache || query === undefined) return null;

    try {
      return await this.cache.feedback(query, parsed);
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      if (err instanceof NotFoundError) {
        this.logger.debug({ query }, 'feedback for uncached answer ignored');
      } else {
        this.logger.warn({ err }, 'failed to record feedback');
      }
      return null;
    }
  }
}
