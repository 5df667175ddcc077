import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'memory';
const MAX_LOGGED_VALUE_CHARS = 2_000;

const SENSITIVE_PATTERNS: Array<[RegExp, string]> = [
  [/\b(sk|pk|rk)-[A-Za-z0-9_-]{16,}\b/g, '$1-[REDACTED]'],
  [/\bBearer\s+[A-Za-z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]'],
  [/\b(api[_-]?key|token|secret|password)(["']?\s*[:=]\s*["']?)[^\s"',;]+/gi, '$1$2[REDACTED]'],
];

function resolveLogDir(): string {
  return path.resolve(process.env.SUBTASK_LOG_DIR ?? DEFAULT_LOG_DIR);
}

function dailyLogPath(now: Date): string {
  return path.join(resolveLogDir(), `${now.toISOString().slice(0, 10)}.md`);
}

function truncate(text: string): string {
  return text.length > MAX_LOGGED_VALUE_CHARS
    ? `${text.slice(0, MAX_LOGGED_VALUE_CHARS)}... [truncated]`
    : text;
}

export function scrubSensitiveText(text: string): string {
  return SENSITIVE_PATTERNS.reduce(
    (current, [pattern, replacement]) => current.replace(pattern, replacement),
    text,
  );
}

async function appendEntry(entry: string): Promise<void> {
  const now = new Date();
  const line = `- ${now.toISOString()} ${scrubSensitiveText(entry)}\n`;
  try {
    await mkdir(resolveLogDir(), { recursive: true });
    await appendFile(dailyLogPath(now), line, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Logger] Failed to append log entry: ${message}`);
  }
}

/** Appends a free-form line to today's log. Never throws. */
export async function logThought(thought: string): Promise<void> {
  await appendEntry(thought);
}

/** Records one callback tool invocation with its (scrubbed, truncated) input and result. */
export async function logToolCall(toolName: string, input: unknown, output: string): Promise<void> {
  let serializedInput: string;
  try {
    serializedInput = JSON.stringify(input) ?? 'undefined';
  } catch {
    serializedInput = '[unserializable input]';
  }
  await appendEntry(
    `[Tool] ${toolName} input=${truncate(serializedInput)} output=${truncate(output)}`,
  );
}
