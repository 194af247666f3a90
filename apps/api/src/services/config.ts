import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z, ZodError } from 'zod';

const SERVICES_DIR = path.dirname(fileURLToPath(import.meta.url));

// Config path relative to this file: services/ -> src/ -> api/ -> apps/ -> project root
const DEFAULT_CONFIG_PATH = path.resolve(SERVICES_DIR, '../../../../config/default.json');

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const querySchema = z.object({
  maxResultCount: z.number().int().min(1).max(100),
  citationCandidateMultiplier: z.number().int().min(1),
  minCitationCandidates: z.number().int().min(1).max(100),
  /** Upper bound applied when the query names no year */
  latestPublicationDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD'),
});

const citationsSchema = z.object({
  workers: z.number().int().min(1).max(64),
  /** Overall budget for one batch of lookups; 0 disables the deadline */
  deadlineMs: z.number().int().min(0),
  probePrimaryBeforeBatch: z.boolean(),
  primary: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    probeTimeoutMs: z.number().int().positive(),
  }),
  secondary: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    maxCitations: z.number().int().min(0).max(50),
  }),
});

const databaseSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive(),
  database: z.string().min(1),
  user: z.string().min(1),
  maxConnections: z.number().int().min(1),
  connectionTimeoutMs: z.number().int().positive(),
  statementTimeoutMs: z.number().int().positive(),
});

const llmSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  timeout: z.number().int().positive(),
});

const summarySchema = z.object({
  mode: z.enum(['local', 'llm', 'off']),
});

const loggingSchema = z.object({
  level: logLevelSchema,
});

export const appConfigSchema = z.object({
  query: querySchema,
  citations: citationsSchema,
  database: databaseSchema,
  llm: llmSchema,
  summary: summarySchema,
  logging: loggingSchema,
});

export type DatabaseConfig = z.infer<typeof databaseSchema>;
export type LLMConfig = z.infer<typeof llmSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Configuration file missing, unreadable or failing validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root for monorepo/dev-server cwd drift.
    candidates.push(path.resolve(SERVICES_DIR, '../../../../', rawPath));
    candidates.push(rawPath);
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? Number(raw) : undefined;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Apply environment overrides on top of the file configuration
 */
function applyEnvOverrides(config: AppConfig): AppConfig {
  const env = process.env;
  const envLevel = logLevelSchema.safeParse(env.LOG_LEVEL);
  return {
    ...config,
    citations: {
      ...config.citations,
      workers: envNumber('CITATION_WORKERS') ?? config.citations.workers,
      deadlineMs: envNumber('CITATION_DEADLINE_MS') ?? config.citations.deadlineMs,
      primary: {
        ...config.citations.primary,
        baseUrl: env.CITATION_PRIMARY_URL || config.citations.primary.baseUrl,
        timeoutMs: envNumber('CITATION_TIMEOUT_MS') ?? config.citations.primary.timeoutMs,
      },
      secondary: {
        ...config.citations.secondary,
        baseUrl: env.OPENCITATIONS_BASE_URL || config.citations.secondary.baseUrl,
        timeoutMs: envNumber('OPENCITATIONS_TIMEOUT_MS') ?? config.citations.secondary.timeoutMs,
      },
    },
    database: {
      ...config.database,
      host: env.PAPERS_DB_HOST || config.database.host,
      port: envNumber('PAPERS_DB_PORT') ?? config.database.port,
      database: env.PAPERS_DB_NAME || config.database.database,
      user: env.PAPERS_DB_USER || config.database.user,
    },
    llm: {
      ...config.llm,
      baseUrl: env.LLM_BASE_URL || config.llm.baseUrl,
      model: env.LLM_MODEL || config.llm.model,
    },
    logging: {
      ...config.logging,
      level: envLevel.success ? envLevel.data : config.logging.level,
    },
  };
}

/**
 * Parse and validate a raw configuration object, then apply env overrides
 */
export function parseConfig(raw: unknown, configPath = '(inline)'): AppConfig {
  try {
    const fileConfig = appConfigSchema.parse(raw);
    return appConfigSchema.parse(applyEnvOverrides(fileConfig));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid configuration in ${configPath}: ${formatIssues(error)}`, configPath);
    }
    throw error;
  }
}

/**
 * Load application configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Configuration file not found or invalid: ${requestedPath} (${reason})`,
      configPath
    );
  }

  cachedConfig = parseConfig(raw, configPath);
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
