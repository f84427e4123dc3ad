import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { InvalidHeaderPolicy } from './http/request.js';

export interface ServerConfig {
  bind: string;
  port: number;
  logEnabled: boolean;
  logPath: string;
  invalidHeaders: InvalidHeaderPolicy;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

export function defaultConfig(): ServerConfig {
  return {
    bind: '127.0.0.1',
    port: 9087,
    logEnabled: true,
    logPath: path.join(process.cwd(), 'reports', 'respondable-http.log.jsonl'),
    invalidHeaders: 'fail'
  };
}

function parsePort(raw: unknown, source: string): number {
  const port = typeof raw === 'number' ? raw : parseInt(String(raw), 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${source}: invalid port ${JSON.stringify(raw)}`);
  }
  return port;
}

function parsePolicy(raw: unknown, source: string): InvalidHeaderPolicy {
  if (raw === 'fail' || raw === 'drop') return raw;
  throw new ConfigError(`${source}: invalidHeaders must be 'fail' or 'drop', got ${JSON.stringify(raw)}`);
}

function parseBool(raw: unknown, source: string): boolean {
  if (typeof raw === 'boolean') return raw;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigError(`${source}: expected a boolean, got ${JSON.stringify(raw)}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadConfigFile(configPath: string): Partial<ServerConfig> {
  const content = fs.readFileSync(configPath, 'utf8');
  const doc: unknown = YAML.parse(content);
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new ConfigError(`${configPath}: expected a mapping at the top level`);
  }

  const { server, log, responder } = doc;
  const out: Partial<ServerConfig> = {};
  if (isRecord(server)) {
    if (server.bind !== undefined) out.bind = String(server.bind);
    if (server.port !== undefined) out.port = parsePort(server.port, configPath);
  }
  if (isRecord(log)) {
    if (log.enabled !== undefined) out.logEnabled = parseBool(log.enabled, configPath);
    if (log.path !== undefined) out.logPath = String(log.path);
  }
  if (isRecord(responder) && responder.invalidHeaders !== undefined) {
    out.invalidHeaders = parsePolicy(responder.invalidHeaders, configPath);
  }
  return out;
}

/**
 * Defaults, then the YAML file named by RESPONDABLE_CONFIG, then RESPONDABLE_* variables.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const config = defaultConfig();

  const configPath = env.RESPONDABLE_CONFIG?.trim();
  if (configPath) {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    Object.assign(config, loadConfigFile(configPath));
  }

  if (env.RESPONDABLE_BIND) config.bind = env.RESPONDABLE_BIND;
  if (env.RESPONDABLE_HTTP_PORT) config.port = parsePort(env.RESPONDABLE_HTTP_PORT, 'RESPONDABLE_HTTP_PORT');
  if (env.RESPONDABLE_HTTP_LOG) config.logPath = env.RESPONDABLE_HTTP_LOG;
  if (env.RESPONDABLE_HTTP_LOG_ENABLED) {
    config.logEnabled = parseBool(env.RESPONDABLE_HTTP_LOG_ENABLED, 'RESPONDABLE_HTTP_LOG_ENABLED');
  }
  if (env.RESPONDABLE_INVALID_HEADERS) {
    config.invalidHeaders = parsePolicy(env.RESPONDABLE_INVALID_HEADERS, 'RESPONDABLE_INVALID_HEADERS');
  }
  return config;
}
