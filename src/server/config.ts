// ============================================================================
// GATEWAY CONFIGURATION
// Resolved once at startup from environment variables and passed down
// ============================================================================

type Env = Record<string, string | undefined>;

export interface ServerConfig {
  port: number;
  host: string;
  timeout: number;
  keepAliveTimeout: number;
  headersTimeout: number;
  /** Express `trust proxy`: hops to trust, or true/false. Governs `req.ip`. */
  trustProxy: boolean | number;
}

export interface DatabaseConfig {
  path: string;
}

export interface AuthConfig {
  apiToken: string;
}

export interface ModelConfig {
  serverUrl?: string;
  timeoutMs: number;
}

export interface MonitoringConfig {
  enablePrometheus: boolean;
  discordWebhookUrl?: string;
  latencyAlertThresholdMs: number;
  alertTimeoutMs: number;
}

export interface UploadConfig {
  maxBytes: number;
}

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  cleanupIntervalMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  auth: AuthConfig;
  model: ModelConfig;
  monitoring: MonitoringConfig;
  upload: UploadConfig;
  rateLimit: RateLimitConfig;
}

function int(value: string | undefined, fallback: string): number {
  return parseInt(value || fallback, 10);
}

function trustProxy(value: string | undefined): boolean | number {
  const normalized = (value || 'false').trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return /^\d+$/.test(normalized) ? parseInt(normalized, 10) : NaN;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    // ==========================================================================
    // SERVER
    // ==========================================================================
    server: {
      port: int(env.PORT, '8000'),
      host: env.HOST || '0.0.0.0',

      // Timeouts (in milliseconds)
      timeout: int(env.SERVER_TIMEOUT_MS, '120000'),
      keepAliveTimeout: int(env.KEEP_ALIVE_TIMEOUT_SEC, '65') * 1000,
      headersTimeout: int(env.HEADERS_TIMEOUT_SEC, '66') * 1000,

      // Only enable behind a reverse proxy that sets X-Forwarded-For
      trustProxy: trustProxy(env.TRUST_PROXY),
    },

    database: {
      path: env.DATABASE_PATH || 'data/predictions.db',
    },

    auth: {
      apiToken: env.API_TOKEN || '',
    },

    // ==========================================================================
    // MODEL SERVER
    // ==========================================================================
    model: {
      serverUrl: optional(env.MODEL_SERVER_URL),
      timeoutMs: int(env.MODEL_TIMEOUT_MS, '30000'),
    },

    // ==========================================================================
    // MONITORING
    // Prometheus is opt-in; Discord is enabled by the presence of a webhook
    // ==========================================================================
    monitoring: {
      enablePrometheus: (env.ENABLE_PROMETHEUS || 'false').toLowerCase() === 'true',
      discordWebhookUrl: optional(env.DISCORD_WEBHOOK_URL),
      latencyAlertThresholdMs: int(env.LATENCY_ALERT_THRESHOLD_MS, '2000'),
      alertTimeoutMs: int(env.ALERT_TIMEOUT_MS, '5000'),
    },

    upload: {
      maxBytes: int(env.MAX_UPLOAD_BYTES, String(10 * 1024 * 1024)),
    },

    rateLimit: {
      windowMs: int(env.RATE_LIMIT_WINDOW_MS, '60000'), // 1 minute
      maxRequests: int(env.RATE_LIMIT_MAX_REQUESTS, '60'),
      cleanupIntervalMs: int(env.RATE_LIMIT_CLEANUP_MS, '600000'), // 10 minutes
    },
  };

  validateConfig(config);
  return config;
}

// ============================================================================
// VALIDATION
// ============================================================================

function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!config.auth.apiToken) {
    errors.push('API_TOKEN environment variable is required');
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (typeof config.server.trustProxy === 'number' && Number.isNaN(config.server.trustProxy)) {
    errors.push('TRUST_PROXY must be true, false or a hop count');
  }

  if (!Number.isInteger(config.monitoring.latencyAlertThresholdMs) || config.monitoring.latencyAlertThresholdMs < 1) {
    errors.push('LATENCY_ALERT_THRESHOLD_MS must be a positive integer');
  }

  if (!Number.isInteger(config.monitoring.alertTimeoutMs) || config.monitoring.alertTimeoutMs < 100) {
    errors.push('ALERT_TIMEOUT_MS must be at least 100');
  }

  if (!Number.isInteger(config.model.timeoutMs) || config.model.timeoutMs < 1) {
    errors.push('MODEL_TIMEOUT_MS must be a positive integer');
  }

  if (!Number.isInteger(config.upload.maxBytes) || config.upload.maxBytes < 1) {
    errors.push('MAX_UPLOAD_BYTES must be a positive integer');
  }

  if (!(config.rateLimit.maxRequests >= 1) || !(config.rateLimit.windowMs >= 1)) {
    errors.push('RATE_LIMIT_MAX_REQUESTS and RATE_LIMIT_WINDOW_MS must be at least 1');
  }

  for (const [name, url] of [
    ['MODEL_SERVER_URL', config.model.serverUrl],
    ['DISCORD_WEBHOOK_URL', config.monitoring.discordWebhookUrl],
  ] as const) {
    if (url && !/^https?:\/\//.test(url)) {
      errors.push(`${name} must be an http(s) URL`);
    }
  }

  if (errors.length > 0) {
    console.error('[Config] Validation errors:');
    errors.forEach(err => console.error(`  - ${err}`));
    throw new Error('Configuration validation failed');
  }
}
