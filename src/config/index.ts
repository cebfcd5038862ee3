export type RenewalMode = 'last-writer-wins' | 'compare-and-swap';
export type SessionStoreKind = 'redis' | 'memory';

export interface RequiredEnvVars {
  TOKEN_SECRET: string;
  VERIFIER_BASE_URL: string;
  VERIFIER_API_KEY: string;
}

export interface RedisConfig {
  url?: string;
  host: string;
  port: number;
  password?: string;
  db: number;
}

export interface AppConfig {
  app: {
    port: number;
    environment: string;
  };
  tokens: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
  session: {
    ttlSeconds: number;
    handlePrefix: string;
    renewalMode: RenewalMode;
    store: SessionStoreKind;
    channelBusinessUnits: Record<string, string>;
  };
  redis: RedisConfig;
  verifier: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    businessUnits: string[];
    mockEnabled: boolean;
  };
}

type Env = Record<string, string | undefined>;

const MIN_SECRET_LENGTH = 32;

const TEST_DEFAULTS: RequiredEnvVars = {
  TOKEN_SECRET: 'test-secret-test-secret-test-secret',
  VERIFIER_BASE_URL: 'http://verifier.test',
  VERIFIER_API_KEY: 'test-api-key',
};

export function validateRequiredEnvVars(env: Env = process.env): RequiredEnvVars {
  const requiredVars: (keyof RequiredEnvVars)[] = ['TOKEN_SECRET', 'VERIFIER_BASE_URL', 'VERIFIER_API_KEY'];

  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  for (const varName of requiredVars) {
    const value = env[varName];

    if (!value) {
      missingVars.push(varName);
      continue;
    }

    switch (varName) {
      case 'TOKEN_SECRET':
        if (value.length < MIN_SECRET_LENGTH) {
          invalidVars.push({ name: varName, reason: `must be at least ${MIN_SECRET_LENGTH} characters` });
        }
        break;
      case 'VERIFIER_BASE_URL':
        if (!/^https?:\/\//.test(value)) {
          invalidVars.push({ name: varName, reason: 'must be an http(s) URL' });
        }
        break;
    }
  }

  if (missingVars.length > 0) {
    throw new Error(`Missing required environment variables: ${missingVars.join(', ')}`);
  }

  if (invalidVars.length > 0) {
    const invalidMessages = invalidVars.map(v => `${v.name}: ${v.reason}`).join(', ');
    throw new Error(`Invalid environment variables: ${invalidMessages}`);
  }

  return {
    TOKEN_SECRET: env.TOKEN_SECRET ?? '',
    VERIFIER_BASE_URL: env.VERIFIER_BASE_URL ?? '',
    VERIFIER_API_KEY: env.VERIFIER_API_KEY ?? '',
  };
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid environment variables: ${name}: must be a positive integer`);
  }
  return parsed;
}

function parseNonNegativeInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid environment variables: ${name}: must be a non-negative integer`);
  }
  return parsed;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parses "channel:BU,channel:BU". Channel ids are case sensitive, business
 * units are normalised to upper case.
 */
export function parseChannelBusinessUnits(value: string | undefined): Record<string, string> {
  const entries = parseList(value, ['1:SME', '2:RETAIL', 'sme:SME', 'retail:RETAIL']);
  const mapping: Record<string, string> = {};

  for (const entry of entries) {
    const separator = entry.lastIndexOf(':');
    if (separator <= 0 || separator === entry.length - 1) {
      throw new Error(`Invalid environment variables: CHANNEL_BUSINESS_UNITS: malformed entry "${entry}"`);
    }
    mapping[entry.substring(0, separator).trim()] = entry.substring(separator + 1).trim().toUpperCase();
  }

  return mapping;
}

function parseRenewalMode(value: string | undefined): RenewalMode {
  if (!value || value === 'last-writer-wins') {
    return 'last-writer-wins';
  }
  if (value === 'compare-and-swap') {
    return value;
  }
  throw new Error(`Invalid environment variables: RENEWAL_MODE: expected last-writer-wins or compare-and-swap`);
}

function parseStoreKind(value: string | undefined): SessionStoreKind {
  if (!value || value === 'redis') {
    return 'redis';
  }
  if (value === 'memory') {
    return value;
  }
  throw new Error(`Invalid environment variables: SESSION_STORE: expected redis or memory`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const environment = env.NODE_ENV || 'development';

  // Tests run without a real verifier or signing secret
  const required = environment === 'test'
    ? {
        TOKEN_SECRET: env.TOKEN_SECRET || TEST_DEFAULTS.TOKEN_SECRET,
        VERIFIER_BASE_URL: env.VERIFIER_BASE_URL || TEST_DEFAULTS.VERIFIER_BASE_URL,
        VERIFIER_API_KEY: env.VERIFIER_API_KEY || TEST_DEFAULTS.VERIFIER_API_KEY,
      }
    : validateRequiredEnvVars(env);

  const accessTtlSeconds = parsePositiveInt('ACCESS_TOKEN_TTL_SECONDS', env.ACCESS_TOKEN_TTL_SECONDS, 900);
  const refreshTtlSeconds = parsePositiveInt('REFRESH_TOKEN_TTL_SECONDS', env.REFRESH_TOKEN_TTL_SECONDS, 3600);

  if (refreshTtlSeconds <= accessTtlSeconds) {
    throw new Error(
      'Invalid environment variables: REFRESH_TOKEN_TTL_SECONDS must be greater than ACCESS_TOKEN_TTL_SECONDS'
    );
  }

  return {
    app: {
      port: parsePositiveInt('PORT', env.PORT, 8080),
      environment,
    },

    tokens: {
      secret: required.TOKEN_SECRET,
      accessTtlSeconds,
      refreshTtlSeconds,
    },

    session: {
      ttlSeconds: parsePositiveInt('SESSION_TTL_SECONDS', env.SESSION_TTL_SECONDS, 3600),
      handlePrefix: env.HANDLE_PREFIX || 'VPB',
      renewalMode: parseRenewalMode(env.RENEWAL_MODE),
      store: parseStoreKind(env.SESSION_STORE),
      channelBusinessUnits: parseChannelBusinessUnits(env.CHANNEL_BUSINESS_UNITS),
    },

    redis: {
      url: env.REDIS_URL || undefined,
      host: env.REDIS_HOST || 'localhost',
      port: parsePositiveInt('REDIS_PORT', env.REDIS_PORT, 6379),
      password: env.REDIS_PASSWORD || undefined,
      db: parseNonNegativeInt('REDIS_DB', env.REDIS_DB, 0),
    },

    verifier: {
      baseUrl: required.VERIFIER_BASE_URL,
      apiKey: required.VERIFIER_API_KEY,
      timeoutMs: parsePositiveInt('VERIFIER_TIMEOUT_MS', env.VERIFIER_TIMEOUT_MS, 5000),
      businessUnits: parseList(env.VERIFIER_BUSINESS_UNITS, ['SME']).map(bu => bu.toUpperCase()),
      mockEnabled: env.MOCK_VERIFIER_ENABLED === 'true',
    },
  };
}
