/**
 * In-memory agent log buffer.
 * Stores recent log lines from agents and helper modules with timestamps and agent names.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AgentLogEntry {
  id: string;
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  detail?: string;
}

const MAX_LOGS = 500;
const logs: AgentLogEntry[] = [];
let nextId = 1;

export function shouldEcho(level: LogLevel): boolean {
  return process.env.LOG_LEVEL === 'debug' || level === 'error';
}

export function agentLog(
  agent: string,
  message: string,
  options?: { level?: LogLevel; detail?: string },
): AgentLogEntry {
  const entry: AgentLogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    agent,
    level: options?.level ?? 'info',
    message,
    detail: options?.detail,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();

  if (shouldEcho(entry.level)) {
    console.log(`[${agent}] [${entry.level.toUpperCase()}] ${message}`, entry.detail ?? '');
  }
  return entry;
}

export function getAgentLogs(afterId?: string): AgentLogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearAgentLogs(): void {
  logs.length = 0;
}
