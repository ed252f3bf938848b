import Joi from "joi";

export interface AppConfig {
  readonly server: {
    readonly port: number;
    readonly apiKey?: string;
  };
  readonly catalog: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly paginationDelayMs: number;
    readonly maxCloudCover: number;
    readonly minCoveragePct: number;
    readonly defaultMaxMonths: number;
  };
  readonly retry: {
    readonly attempts: number;
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
  };
  readonly storage: {
    readonly bucket: string;
    readonly region: string;
    readonly endpoint?: string;
    readonly accessKeyId?: string;
    readonly secretAccessKey?: string;
    readonly maxPoolConnections: number;
  };
  readonly downloads: {
    readonly chunkSize: number;
    readonly maxConcurrent: number;
    readonly timeoutMs: number;
  };
  readonly bulkTransfer: {
    readonly binary: string;
    readonly workers: number;
    readonly timeoutMs: number;
  };
  readonly database: {
    readonly path: string;
  };
  readonly logLevel: string;
}

const MIN_PART_SIZE = 5 * 1024 * 1024;

const envSchema = Joi.object({
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().optional(),
  PL_API_KEY: Joi.string().required(),
  PLANET_BASE_URL: Joi.string().uri().default("https://api.planet.com"),
  API_TIMEOUT_SEC: Joi.number().positive().default(30),
  PAGINATION_DELAY_SEC: Joi.number().min(0).default(1),
  MAX_CLOUD_COVER: Joi.number().min(0).max(1).default(0),
  MIN_COVERAGE_PCT: Joi.number().min(0).max(100).default(98),
  DEFAULT_MAX_MONTHS: Joi.number().integer().min(1).default(6),
  RETRY_ATTEMPTS: Joi.number().integer().min(1).default(3),
  RETRY_MIN_DELAY_SEC: Joi.number().min(0).default(2),
  RETRY_MAX_DELAY_SEC: Joi.number().min(0).default(30),
  S3_BUCKET: Joi.string().default("imagery-acquisition"),
  S3_REGION: Joi.string().default("us-east-1"),
  S3_ENDPOINT: Joi.string().uri().optional(),
  S3_MAX_POOL_CONNECTIONS: Joi.number().integer().min(1).default(50),
  AWS_ACCESS_KEY_ID: Joi.string().optional(),
  AWS_SECRET_ACCESS_KEY: Joi.string().optional(),
  DOWNLOAD_CHUNK_SIZE: Joi.number().integer().min(MIN_PART_SIZE).default(8 * 1024 * 1024),
  MAX_CONCURRENT_DOWNLOADS: Joi.number().integer().min(1).default(10),
  DOWNLOAD_TIMEOUT_SEC: Joi.number().positive().default(300),
  BULK_TRANSFER_BINARY: Joi.string().default("s5cmd"),
  BULK_TRANSFER_WORKERS: Joi.number().integer().min(1).default(20),
  BULK_TRANSFER_TIMEOUT_SEC: Joi.number().positive().default(3600),
  DB_PATH: Joi.string().default("./orders.db"),
  LOG_LEVEL: Joi.string()
    .valid("error", "warn", "info", "http", "verbose", "debug", "silly")
    .default("info"),
}).unknown(true);

interface ValidatedEnv {
  SERVER_PORT: number;
  SERVER_API_KEY?: string;
  PL_API_KEY: string;
  PLANET_BASE_URL: string;
  API_TIMEOUT_SEC: number;
  PAGINATION_DELAY_SEC: number;
  MAX_CLOUD_COVER: number;
  MIN_COVERAGE_PCT: number;
  DEFAULT_MAX_MONTHS: number;
  RETRY_ATTEMPTS: number;
  RETRY_MIN_DELAY_SEC: number;
  RETRY_MAX_DELAY_SEC: number;
  S3_BUCKET: string;
  S3_REGION: string;
  S3_ENDPOINT?: string;
  S3_MAX_POOL_CONNECTIONS: number;
  AWS_ACCESS_KEY_ID?: string;
  AWS_SECRET_ACCESS_KEY?: string;
  DOWNLOAD_CHUNK_SIZE: number;
  MAX_CONCURRENT_DOWNLOADS: number;
  DOWNLOAD_TIMEOUT_SEC: number;
  BULK_TRANSFER_BINARY: string;
  BULK_TRANSFER_WORKERS: number;
  BULK_TRANSFER_TIMEOUT_SEC: number;
  DB_PATH: string;
  LOG_LEVEL: string;
}

/**
 * Builds the application configuration once at startup. Everything
 * downstream receives this value through its constructor.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, val]) => val !== undefined && val !== ""),
  );
  const { error, value } = envSchema.validate(present, { convert: true });
  if (error) {
    throw new Error(`Invalid configuration: ${error.message}`);
  }
  const v: ValidatedEnv = value;

  return Object.freeze({
    server: {
      port: v.SERVER_PORT,
      apiKey: v.SERVER_API_KEY,
    },
    catalog: {
      apiKey: v.PL_API_KEY,
      baseUrl: v.PLANET_BASE_URL.replace(/\/+$/, ""),
      timeoutMs: v.API_TIMEOUT_SEC * 1000,
      paginationDelayMs: v.PAGINATION_DELAY_SEC * 1000,
      maxCloudCover: v.MAX_CLOUD_COVER,
      minCoveragePct: v.MIN_COVERAGE_PCT,
      defaultMaxMonths: v.DEFAULT_MAX_MONTHS,
    },
    retry: {
      attempts: v.RETRY_ATTEMPTS,
      minDelayMs: v.RETRY_MIN_DELAY_SEC * 1000,
      maxDelayMs: v.RETRY_MAX_DELAY_SEC * 1000,
    },
    storage: {
      bucket: v.S3_BUCKET,
      region: v.S3_REGION,
      endpoint: v.S3_ENDPOINT,
      accessKeyId: v.AWS_ACCESS_KEY_ID,
      secretAccessKey: v.AWS_SECRET_ACCESS_KEY,
      maxPoolConnections: v.S3_MAX_POOL_CONNECTIONS,
    },
    downloads: {
      chunkSize: v.DOWNLOAD_CHUNK_SIZE,
      maxConcurrent: v.MAX_CONCURRENT_DOWNLOADS,
      timeoutMs: v.DOWNLOAD_TIMEOUT_SEC * 1000,
    },
    bulkTransfer: {
      binary: v.BULK_TRANSFER_BINARY,
      workers: v.BULK_TRANSFER_WORKERS,
      timeoutMs: v.BULK_TRANSFER_TIMEOUT_SEC * 1000,
    },
    database: {
      path: v.DB_PATH,
    },
    logLevel: v.LOG_LEVEL,
  });
}
