import { writeFileSync, readFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getActivityLogPath } from './path.js';

const LogEntrySchema = z.object({
  timestamp: z.string(),
  endpoint: z.string(),
  action: z.enum(['login', 'logout', 'endpoint-switch']),
  org: z.string().optional(),
  space: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;
export type LogAction = LogEntry['action'];

/**
 * Print a diagnostic line when ORBIT_VERBOSE=true
 */
export function logVerbose(message: string): void {
  if (process.env.ORBIT_VERBOSE === 'true') {
    console.log(`[orbit] ${message}`);
  }
}

/**
 * Ensure the log directory exists
 */
function ensureLogDir(): void {
  const logDir = dirname(getActivityLogPath());

  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Read existing log entries, skipping lines that are not valid entries
 */
function readLogEntries(): LogEntry[] {
  const logPath = getActivityLogPath();

  if (!existsSync(logPath)) {
    return [];
  }

  let content: string;
  try {
    content = readFileSync(logPath, 'utf8');
  } catch (error) {
    logVerbose(`Could not read activity log: ${String(error)}`);
    return [];
  }

  const entries: LogEntry[] = [];
  for (const line of content.trim().split('\n')) {
    if (line.length === 0) {
      continue;
    }
    try {
      const parsed = LogEntrySchema.safeParse(JSON.parse(line));
      if (parsed.success) {
        entries.push(parsed.data);
      }
    } catch {
      // Corrupt line
    }
  }
  return entries;
}

/**
 * Append an activity entry
 */
export function logActivity(
  action: LogAction,
  endpoint: string,
  target: { org?: string; space?: string } = {}
): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    endpoint,
    action,
    ...(target.org ? { org: target.org } : {}),
    ...(target.space ? { space: target.space } : {}),
  };

  try {
    ensureLogDir();
    writeFileSync(getActivityLogPath(), JSON.stringify(entry) + '\n', {
      flag: 'a',
    });
  } catch (error) {
    console.warn(
      `Warning: Failed to write to log: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Get the most recent login recorded for an endpoint
 */
export function getLastLogin(endpoint: string): LogEntry | null {
  const entries = readLogEntries()
    .filter((entry) => entry.endpoint === endpoint && entry.action === 'login')
    .sort(
      (a, b) =>
        new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime()
    );

  return entries.length > 0 ? entries[0] : null;
}
