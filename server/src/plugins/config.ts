import fp from 'fastify-plugin';

/**
 * Settings for the S3 + Rekognition image labeler.
 * Present only when all credentials and the bucket are configured.
 */
export interface AwsConfig {
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
}

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  databaseUrl: string;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  nodeEnv: string;
  sessionDuration: number; // seconds
  secureCookies: boolean;
  trustProxy: boolean;
  maxUploadBytes: number;
  aws?: AwsConfig;
  imageAnalysisEnabled: boolean;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

const LOG_LEVELS: readonly AppConfig['logLevel'][] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

function isLogLevel(value: string): value is AppConfig['logLevel'] {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Pure function to load and validate configuration from environment variables.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @returns Validated AppConfig
 * @throws Error if configuration is invalid (lists all validation errors)
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const errors: string[] = [];

  // Helper to treat empty strings as undefined
  const getValue = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  const parseBoolean = (key: string, fallback: boolean): boolean => {
    const raw = (getValue(key) ?? String(fallback)).toLowerCase();
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    errors.push(`${key} must be 'true' or 'false', got: ${getValue(key)}`);
    return fallback;
  };

  // Parse and validate PORT
  const portStr = getValue('PORT') ?? '3000';
  const port = parseInt(portStr, 10);
  if (isNaN(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  const host = getValue('HOST') ?? '0.0.0.0';

  const databaseUrl = getValue('DATABASE_URL') ?? '/app/data/larder.db';

  // Parse and validate LOG_LEVEL
  const logLevelStr = (getValue('LOG_LEVEL') ?? 'info').toLowerCase();
  let logLevel: AppConfig['logLevel'] = 'info';
  if (isLogLevel(logLevelStr)) {
    logLevel = logLevelStr;
  } else {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${getValue('LOG_LEVEL')}`);
  }

  const nodeEnv = getValue('NODE_ENV') ?? 'production';

  // Parse and validate SESSION_DURATION
  const sessionDurationStr = getValue('SESSION_DURATION') ?? '604800';
  const sessionDuration = parseInt(sessionDurationStr, 10);
  if (isNaN(sessionDuration)) {
    errors.push(`SESSION_DURATION must be a valid number, got: ${sessionDurationStr}`);
  } else if (sessionDuration <= 0) {
    errors.push(`SESSION_DURATION must be greater than 0, got: ${sessionDuration}`);
  }

  const secureCookies = parseBoolean('SECURE_COOKIES', true);
  const trustProxy = parseBoolean('TRUST_PROXY', false);

  // Parse and validate MAX_UPLOAD_BYTES (default 10 MiB)
  const maxUploadStr = getValue('MAX_UPLOAD_BYTES') ?? '10485760';
  const maxUploadBytes = parseInt(maxUploadStr, 10);
  if (isNaN(maxUploadBytes)) {
    errors.push(`MAX_UPLOAD_BYTES must be a valid number, got: ${maxUploadStr}`);
  } else if (maxUploadBytes <= 0) {
    errors.push(`MAX_UPLOAD_BYTES must be greater than 0, got: ${maxUploadBytes}`);
  }

  // AWS image storage / label detection (all optional)
  const region = getValue('AWS_REGION') ?? 'us-east-1';
  const accessKeyId = getValue('AWS_ACCESS_KEY_ID');
  const secretAccessKey = getValue('AWS_SECRET_ACCESS_KEY');
  const bucket = getValue('AWS_STORAGE_BUCKET_NAME');

  // Image analysis is enabled only when credentials AND bucket are set
  const aws =
    accessKeyId && secretAccessKey && bucket
      ? { region, accessKeyId, secretAccessKey, bucket }
      : undefined;

  // If there are any validation errors, throw a single error listing all of them
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return {
    port,
    host,
    databaseUrl,
    logLevel,
    nodeEnv,
    sessionDuration,
    secureCookies,
    trustProxy,
    maxUploadBytes,
    aws,
    imageAnalysisEnabled: aws !== undefined,
  };
}

export default fp(
  async function configPlugin(fastify) {
    const config = loadConfig(process.env);

    // Credentials are never logged
    fastify.log.info(
      {
        port: config.port,
        host: config.host,
        databaseUrl: config.databaseUrl,
        logLevel: config.logLevel,
        nodeEnv: config.nodeEnv,
        sessionDuration: config.sessionDuration,
        secureCookies: config.secureCookies,
        trustProxy: config.trustProxy,
        maxUploadBytes: config.maxUploadBytes,
        imageAnalysisEnabled: config.imageAnalysisEnabled,
        awsRegion: config.aws?.region,
        awsBucket: config.aws?.bucket,
      },
      'Configuration loaded',
    );

    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
