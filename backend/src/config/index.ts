/**
 * Application Configuration
 * Loaded from environment variables with sensible defaults for development
 * All sensitive values MUST be provided via environment variables in production
 */

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

export interface AuthConfig {
  readonly jwtSecret: string;
  /** Empty string disables the issuer check */
  readonly issuer: string;
  /** Empty string disables the audience check */
  readonly audience: string;
  readonly expirationHours: number;
  readonly clockSkewSeconds: number;
  /** Skipped by the token gate, together with everything below them */
  readonly publicPaths: readonly string[];
  /** Skipped by the token gate only when matched exactly */
  readonly publicExactPaths: readonly string[];
  readonly enableTestEndpoints: boolean;
}

export interface CacheConfig {
  readonly sizeLimit: number;
  readonly compactionPercentage: number;
}

export interface HttpConfig {
  readonly rateLimitMax: number;
  readonly corsOrigins: readonly string[];
  readonly enableSwagger: boolean;
}

export interface DataConfig {
  readonly seedSampleData: boolean;
  /** Resolved against the working directory */
  readonly seedFile: string;
}

export interface Config {
  readonly env: string;
  readonly server: ServerConfig;
  readonly auth: AuthConfig;
  readonly cache: CacheConfig;
  readonly http: HttpConfig;
  readonly data: DataConfig;
}

export const DEFAULT_JWT_SECRET = 'dev-secret-change-in-production';

export const DEFAULT_PUBLIC_PATHS: readonly string[] = [
  '/health',
  '/swagger',
  '/api/auth/login',
  '/api/auth/register',
  '/api/auth/refresh',
];

export const DEFAULT_PUBLIC_EXACT_PATHS: readonly string[] = ['/api'];

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvAsIntOrDefault(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvAsFloatOrDefault(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvAsBoolOrDefault(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function getEnvAsListOrDefault(key: string, defaultValue: readonly string[]): readonly string[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(): Config {
  const env = getEnvOrDefault('NODE_ENV', 'development');
  const isProduction = env === 'production';
  const isTest = env === 'test';

  return {
    env,
    server: {
      host: getEnvOrDefault('SERVER_HOST', '0.0.0.0'),
      port: getEnvAsIntOrDefault('PORT', getEnvAsIntOrDefault('SERVER_PORT', 5000)),
    },
    auth: {
      jwtSecret: getEnvOrDefault('JWT_SECRET', DEFAULT_JWT_SECRET),
      issuer: getEnvOrDefault('JWT_ISSUER', 'employee-directory-api'),
      audience: getEnvOrDefault('JWT_AUDIENCE', 'employee-directory-clients'),
      expirationHours: getEnvAsIntOrDefault('JWT_EXPIRATION_HOURS', 24),
      clockSkewSeconds: getEnvAsIntOrDefault('JWT_CLOCK_SKEW_SECONDS', 300),
      publicPaths: getEnvAsListOrDefault('AUTH_PUBLIC_PATHS', DEFAULT_PUBLIC_PATHS),
      publicExactPaths: getEnvAsListOrDefault('AUTH_PUBLIC_EXACT_PATHS', DEFAULT_PUBLIC_EXACT_PATHS),
      enableTestEndpoints: getEnvAsBoolOrDefault('ENABLE_TEST_ENDPOINTS', !isProduction),
    },
    cache: {
      sizeLimit: getEnvAsIntOrDefault('CACHE_SIZE_LIMIT', 1000),
      compactionPercentage: getEnvAsFloatOrDefault('CACHE_COMPACTION_PERCENTAGE', 0.25),
    },
    http: {
      rateLimitMax: getEnvAsIntOrDefault('RATE_LIMIT_MAX', 1000),
      corsOrigins: getEnvAsListOrDefault('CORS_ORIGINS', ['*']),
      enableSwagger: getEnvAsBoolOrDefault('ENABLE_SWAGGER', !isProduction),
    },
    data: {
      seedSampleData: getEnvAsBoolOrDefault('SEED_SAMPLE_DATA', !isTest),
      seedFile: getEnvOrDefault('SEED_DATA_FILE', 'data/seed-users.json'),
    },
  };
}

/**
 * Validate configuration and return list of errors
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];
  const isProduction = config.env === 'production';

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push(`Invalid PORT: ${config.server.port}. Must be between 1 and 65535.`);
  }

  if (!config.auth.jwtSecret) {
    errors.push('JWT_SECRET is required');
  }
  if (isProduction) {
    if (config.auth.jwtSecret.length < 32) {
      errors.push('JWT_SECRET must be at least 32 characters in production');
    }
    if (config.auth.jwtSecret === DEFAULT_JWT_SECRET) {
      errors.push('JWT_SECRET must be changed from default in production');
    }
  }
  if (config.auth.expirationHours < 1) {
    errors.push(`Invalid JWT_EXPIRATION_HOURS: ${config.auth.expirationHours}. Must be at least 1.`);
  }
  if (config.auth.clockSkewSeconds < 0) {
    errors.push(`Invalid JWT_CLOCK_SKEW_SECONDS: ${config.auth.clockSkewSeconds}. Must not be negative.`);
  }
  if (config.auth.publicPaths.some((path) => !path.startsWith('/'))) {
    errors.push('AUTH_PUBLIC_PATHS entries must start with "/"');
  }
  if (config.auth.publicExactPaths.some((path) => !path.startsWith('/'))) {
    errors.push('AUTH_PUBLIC_EXACT_PATHS entries must start with "/"');
  }

  if (config.cache.sizeLimit < 1) {
    errors.push(`Invalid CACHE_SIZE_LIMIT: ${config.cache.sizeLimit}. Must be at least 1.`);
  }
  if (config.cache.compactionPercentage <= 0 || config.cache.compactionPercentage > 1) {
    errors.push(
      `Invalid CACHE_COMPACTION_PERCENTAGE: ${config.cache.compactionPercentage}. Must be in (0, 1].`
    );
  }

  if (config.http.rateLimitMax < 1) {
    errors.push(`Invalid RATE_LIMIT_MAX: ${config.http.rateLimitMax}. Must be at least 1.`);
  }

  return errors;
}
