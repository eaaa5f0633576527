/**
 * Base class for agents: validates input and output with zod, keeps a log of
 * the current execution and mirrors it into the shared agent log buffer.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Agent, AgentConfig, AgentContext, AgentLog, AgentResult } from './types.js';
import { agentLog, type LogLevel } from './agent-logs.js';

export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected logs: AgentLog[] = [];
  private runId: string | undefined;

  protected log(level: LogLevel, message: string, data?: unknown): void {
    this.logs.push({ at: new Date(), level, message, runId: this.runId, data });
    agentLog(this.config.name, this.runId ? `[${this.runId}] ${message}` : message, {
      level,
      detail: data === undefined ? undefined : describe(data),
    });
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  async execute(input: TInput, context: Partial<AgentContext> = {}): Promise<AgentResult<TOutput>> {
    const started = Date.now();
    const fullContext: AgentContext = { startedAt: new Date(started), ...context };
    this.logs = [];
    this.runId = fullContext.runId;

    this.info(`${this.config.name} v${this.config.version} started`, fullContext.metadata);

    try {
      const validatedInput = this.inputSchema.parse(input);
      const output = await this.run(validatedInput, fullContext);
      const data = this.outputSchema.parse(output);

      const duration = Date.now() - started;
      this.info(`Finished in ${duration}ms`);
      return { success: true, data, duration, context: fullContext };
    } catch (err) {
      const duration = Date.now() - started;
      const message = err instanceof Error ? err.message : String(err);
      this.error(`Failed after ${duration}ms: ${message}`, err);
      return { success: false, error: message, cause: err, duration, context: fullContext };
    }
  }

  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;

  /** Log entries of the latest execution. */
  getLogs(): AgentLog[] {
    return [...this.logs];
  }
}

function describe(data: unknown): string {
  if (data instanceof Error) return data.stack ?? data.message;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}
