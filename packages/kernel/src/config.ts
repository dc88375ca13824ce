// Configuration: loads from YAML + environment variables
// Layered config: defaults → YAML file → env vars → programmatic overrides

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const LOOPBACK_HOSTS = ["127.0.0.1:*", "localhost:*", "[::1]:*"];
const LOOPBACK_ORIGINS = ["http://127.0.0.1:*", "http://localhost:*", "http://[::1]:*"];

/** Logging configuration */
export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  pretty: z.boolean().default(process.env.NODE_ENV !== "production"),
  file: z.string().optional(),
});

/** Identity lifecycle configuration */
export const IdentityConfigSchema = z.object({
  /** Local lookup name for the owned identity */
  alias: z.string().min(1).default("sealwire"),
  /** DID template; `{name}` becomes `<alias>-<random suffix>` */
  didTemplate: z
    .string()
    .refine((value) => value.includes("{name}"), "didTemplate must contain {name}")
    .default("did:sealwire:{name}"),
  /** `history` identities publish a history log entry next to the document */
  format: z.enum(["history", "plain"]).default("history"),
  /** Endpoint advertised in the identity document */
  transport: z.string().min(1).default("client://"),
  /** Maximum length of the generated name segment */
  maxNameLength: z.number().int().min(8).max(255).default(63),
  publishUrl: z.string().url().default("http://127.0.0.1:8700/identities"),
  historyUrl: z
    .string()
    .refine((value) => value.includes("{did}"), "historyUrl must contain {did}")
    .default("http://127.0.0.1:8700/identities/{did}/history"),
  resolveUrl: z
    .string()
    .refine((value) => value.includes("{did}"), "resolveUrl must contain {did}")
    .default("http://127.0.0.1:8700/identities/{did}"),
  /** JSON file holding owned identities; in-memory when absent */
  storePath: z.string().optional(),
  /** What to do when an opened envelope names an unexpected sender or receiver */
  mismatchPolicy: z.enum(["warn", "reject"]).default("warn"),
  /** Log every sealed and opened envelope at info level */
  verbose: z.boolean().default(false),
  requestTimeoutMs: z.number().int().min(100).default(10000),
});

/** SSE transport configuration */
export const SseConfigSchema = z.object({
  /** GET path that opens the event stream */
  path: z.string().startsWith("/").default("/sse"),
  /** POST path the client is told to deliver messages to */
  endpoint: z.string().startsWith("/").default("/messages/"),
  /** Prefix the server is mounted under */
  mountPath: z.string().default(""),
  /** Per-request HTTP timeout */
  timeoutMs: z.number().int().min(100).default(5000),
  /** Idle window on the GET stream before disconnecting */
  readTimeoutMs: z.number().int().min(100).default(5 * 60 * 1000),
  maxBodyBytes: z.number().int().min(1024).default(4 * 1024 * 1024),
  /** Keep-alive comment interval on an open stream; keep it below the client's readTimeoutMs */
  pingIntervalMs: z.number().int().min(10).default(15000),
});

/** The part of the SSE section a server reads; timeouts belong to the client */
export const SseServerConfigSchema = SseConfigSchema.pick({
  path: true,
  endpoint: true,
  mountPath: true,
  maxBodyBytes: true,
  pingIntervalMs: true,
});

/** WebSocket transport configuration */
export const WebSocketConfigSchema = z.object({
  subprotocol: z.string().min(1).default("mcp"),
  frameEncoding: z.enum(["text", "binary"]).default("text"),
  maxPayloadBytes: z.number().int().min(1024).default(4 * 1024 * 1024),
});

/** Transport configuration */
export const TransportConfigSchema = z.object({
  sse: SseConfigSchema.default({}),
  websocket: WebSocketConfigSchema.default({}),
  /** Whether a reconnecting peer may replace a live session */
  sessionPolicy: z.enum(["replace", "reject"]).default("replace"),
});

/** Request validation (DNS rebinding protection) */
export const SecurityConfigSchema = z.object({
  enableDnsRebindingProtection: z.boolean().default(true),
  allowedHosts: z.array(z.string()).default(LOOPBACK_HOSTS),
  allowedOrigins: z.array(z.string()).default(LOOPBACK_ORIGINS),
});

/** Full configuration schema */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  identity: IdentityConfigSchema.default({}),
  transport: TransportConfigSchema.default({}),
  security: SecurityConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;
export type SseConfig = z.infer<typeof SseConfigSchema>;
export type SseServerConfig = z.infer<typeof SseServerConfigSchema>;
export type WebSocketConfig = z.infer<typeof WebSocketConfigSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;

/** Partial input accepted by the loaders; every field has a default */
export type ConfigInput = z.input<typeof ConfigSchema>;
export type IdentityConfigInput = z.input<typeof IdentityConfigSchema>;
export type SseConfigInput = z.input<typeof SseConfigSchema>;
export type SseServerConfigInput = z.input<typeof SseServerConfigSchema>;
export type WebSocketConfigInput = z.input<typeof WebSocketConfigSchema>;
export type SecurityConfigInput = z.input<typeof SecurityConfigSchema>;

/** Environment variable mappings */
const ENV_MAPPINGS: Record<string, string> = {
  LOG_LEVEL: "logging.level",
  LOG_PRETTY: "logging.pretty",
  LOG_FILE: "logging.file",
  SEALWIRE_ALIAS: "identity.alias",
  SEALWIRE_DID_TEMPLATE: "identity.didTemplate",
  SEALWIRE_IDENTITY_FORMAT: "identity.format",
  SEALWIRE_PUBLISH_URL: "identity.publishUrl",
  SEALWIRE_HISTORY_URL: "identity.historyUrl",
  SEALWIRE_RESOLVE_URL: "identity.resolveUrl",
  SEALWIRE_STORE_PATH: "identity.storePath",
  SEALWIRE_MISMATCH_POLICY: "identity.mismatchPolicy",
  SEALWIRE_SSE_PATH: "transport.sse.path",
  SEALWIRE_SSE_ENDPOINT: "transport.sse.endpoint",
  SEALWIRE_SSE_READ_TIMEOUT_MS: "transport.sse.readTimeoutMs",
  SEALWIRE_SSE_PING_INTERVAL_MS: "transport.sse.pingIntervalMs",
  SEALWIRE_WS_SUBPROTOCOL: "transport.websocket.subprotocol",
  SEALWIRE_WS_FRAME_ENCODING: "transport.websocket.frameEncoding",
  SEALWIRE_SESSION_POLICY: "transport.sessionPolicy",
};

/** Comma separated list variables */
const ENV_LIST_MAPPINGS: Record<string, string> = {
  SEALWIRE_ALLOWED_HOSTS: "security.allowedHosts",
  SEALWIRE_ALLOWED_ORIGINS: "security.allowedOrigins",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Set a nested value in an object using dot notation */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split(".");
  const lastKey = keys.pop();
  if (lastKey === undefined) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/** Parse environment value to appropriate type */
function parseEnvValue(value: string): unknown {
  if (value.toLowerCase() === "true") return true;
  if (value.toLowerCase() === "false") return false;
  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== "") return num;
  return value;
}

/** Load configuration from YAML file */
function loadYamlConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${configPath} must contain a mapping at the top level`);
  }
  return parsed;
}

/** Load configuration from environment variables */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") {
      // Strings that look numeric stay strings where the schema wants text
      const typed = configPath === "identity.alias" ? value : parseEnvValue(value);
      setNestedValue(config, configPath, typed);
    }
  }

  for (const [envKey, configPath] of Object.entries(ENV_LIST_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") {
      setNestedValue(
        config,
        configPath,
        value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0),
      );
    }
  }

  return config;
}

/** Deep merge two objects */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    const existing = result[key];
    if (isRecord(value)) {
      result[key] = deepMerge(isRecord(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/** Configuration manager */
export class ConfigManager {
  private config: Config | null = null;
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.configPath = configPath ?? this.findConfigFile();
  }

  private findConfigFile(): string {
    const locations = [
      "sealwire.config.yaml",
      "sealwire.config.yml",
      join(process.cwd(), ".sealwire", "config.yaml"),
    ];

    for (const loc of locations) {
      if (existsSync(loc)) {
        return loc;
      }
    }

    return "sealwire.config.yaml";
  }

  load(overrides: ConfigInput = {}): Config {
    const yamlConfig = loadYamlConfig(this.configPath);
    const envConfig = loadEnvConfig(this.env);

    const merged = deepMerge(deepMerge(yamlConfig, envConfig), { ...overrides });

    const result = ConfigSchema.parse(merged);
    this.config = result;
    return result;
  }

  get(): Config {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getSection<K extends keyof Config>(section: K): Config[K] {
    return this.get()[section];
  }
}

/** Parse an in-code configuration without touching files or the environment */
export function defineConfig(config: ConfigInput = {}): Config {
  return ConfigSchema.parse(config);
}

export function loadConfig(configPath?: string, overrides: ConfigInput = {}): Config {
  return new ConfigManager(configPath).load(overrides);
}

export function createConfigManager(configPath?: string, env?: NodeJS.ProcessEnv): ConfigManager {
  return new ConfigManager(configPath, env);
}
