import * as path from 'path';
import { z } from 'zod';
import type { LogLevel } from './logger';

export type TransportKind = 'stdio' | 'streamable-http';

export interface RemoteConfig {
  /** Origins (scheme://host[:port]) that remote-uri locators may point at. Empty disables remote documents. */
  allowedOrigins: string[];
  timeoutMs?: number;
  headers: Record<string, string>;
}

export interface ServerConfig {
  root: string;
  transport: TransportKind;
  host: string;
  port: number;
  autoRegisterHandles: boolean;
  autoBackup: boolean;
  /** Apply refuses previews scoring above this without an explicit override. */
  safetyThreshold: number;
  lockTimeoutMs: number;
  logLevel: LogLevel;
  remote: RemoteConfig;
}

/** Flags as parsed by the CLI; every field is optional and wins over the environment. */
export interface CliOptions {
  root?: string;
  transport?: string;
  host?: string;
  port?: string;
  remoteOrigin?: string[];
  httpTimeout?: string;
  httpHeader?: string[];
  httpAuthToken?: string;
}

export const DEFAULT_SAFETY_THRESHOLD = 0.5;
export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

const boolish = z
  .string()
  .transform((raw) => ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase()));

const configSchema = z.object({
  root: z.string().min(1),
  transport: z.enum(['stdio', 'streamable-http']),
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  autoRegisterHandles: boolish,
  autoBackup: boolish,
  safetyThreshold: z.coerce.number().min(0).max(1),
  lockTimeoutMs: z.coerce.number().int().positive(),
  logLevel: z
    .string()
    .transform((raw) => raw.trim().toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  httpTimeoutSeconds: z.coerce.number().positive().optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Split `key=value` / `key:value` assignments. Blank entries are skipped and
 * entries without a separator are returned in `rejected`.
 */
export function parseHeaderAssignments(assignments: string[]): { headers: Record<string, string>; rejected: string[] } {
  const headers: Record<string, string> = {};
  const rejected: string[] = [];
  for (const assignment of assignments) {
    const item = assignment.trim();
    if (!item) continue;
    const eq = item.indexOf('=');
    const colon = item.indexOf(':');
    const cut = eq >= 0 && (colon < 0 || eq < colon) ? eq : colon;
    if (cut <= 0) {
      rejected.push(item);
      continue;
    }
    headers[item.slice(0, cut).trim()] = item.slice(cut + 1).trim();
  }
  return { headers, rejected };
}

function normalizeOrigin(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ConfigError(`Invalid remote origin: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Remote origin must use http or https: ${raw}`);
  }
  return url.origin;
}

export function loadConfig(cli: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = configSchema.safeParse({
    root: cli.root ?? env.HWPX_MCP_ROOT ?? process.cwd(),
    transport: cli.transport ?? env.HWPX_MCP_TRANSPORT ?? 'stdio',
    host: cli.host ?? env.HWPX_MCP_HOST ?? '127.0.0.1',
    port: cli.port ?? env.HWPX_MCP_PORT ?? '8000',
    autoRegisterHandles: env.HWPX_MCP_AUTO_REGISTER ?? 'true',
    autoBackup: env.HWPX_MCP_AUTOBACKUP ?? 'false',
    safetyThreshold: env.HWPX_MCP_SAFETY_THRESHOLD ?? String(DEFAULT_SAFETY_THRESHOLD),
    lockTimeoutMs: env.HWPX_MCP_LOCK_TIMEOUT_MS ?? String(DEFAULT_LOCK_TIMEOUT_MS),
    logLevel: env.LOG_LEVEL ?? 'info',
    httpTimeoutSeconds: cli.httpTimeout ?? env.HWPX_MCP_HTTP_TIMEOUT,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration - ${issues.join('; ')}`);
  }
  const values = parsed.data;

  const headerTokens: string[] = [];
  if (env.HWPX_MCP_HTTP_HEADERS) {
    headerTokens.push(...env.HWPX_MCP_HTTP_HEADERS.replace(/;/g, '\n').split('\n'));
  }
  headerTokens.push(...(cli.httpHeader ?? []));
  const { headers, rejected } = parseHeaderAssignments(headerTokens);
  if (rejected.length > 0) {
    throw new ConfigError(`Malformed HTTP header assignment: ${rejected.join(', ')}`);
  }
  const authToken = cli.httpAuthToken ?? env.HWPX_MCP_HTTP_AUTH_TOKEN;
  const hasAuthorization = Object.keys(headers).some((key) => key.toLowerCase() === 'authorization');
  if (authToken && !hasAuthorization) {
    headers.Authorization = `Bearer ${authToken.trim()}`;
  }

  const originTokens = cli.remoteOrigin ?? (env.HWPX_MCP_REMOTE_ORIGINS ?? '').split(',');
  const allowedOrigins = Array.from(
    new Set(originTokens.map((token) => token.trim()).filter(Boolean).map(normalizeOrigin)),
  );

  return {
    root: path.resolve(values.root),
    transport: values.transport,
    host: values.host,
    port: values.port,
    autoRegisterHandles: values.autoRegisterHandles,
    autoBackup: values.autoBackup,
    safetyThreshold: values.safetyThreshold,
    lockTimeoutMs: values.lockTimeoutMs,
    logLevel: values.logLevel,
    remote: {
      allowedOrigins,
      timeoutMs: values.httpTimeoutSeconds === undefined ? undefined : Math.round(values.httpTimeoutSeconds * 1000),
      headers,
    },
  };
}

/** Header names safe to log: authorization values are never echoed. */
export function describeRemote(remote: RemoteConfig): Record<string, unknown> {
  const names = Object.keys(remote.headers);
  return {
    allowedOrigins: remote.allowedOrigins,
    headers: names.filter((name) => name.toLowerCase() !== 'authorization').sort(),
    authorization: names.some((name) => name.toLowerCase() === 'authorization') ? 'provided' : 'absent',
    timeoutMs: remote.timeoutMs ?? null,
  };
}
