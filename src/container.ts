import { AppConfig } from './config';
import { ChannelRegistry } from './config/channels';
import { RedisManager } from './config/redis';
import { IdentityService } from './services/identity.service';
import { SessionService } from './services/session.service';
import { TokenService } from './services/token.service';
import { ExternalVerifier, HttpExternalVerifier, VerifierRegistry } from './services/verifier.service';
import { MemorySessionStore } from './stores/memory-session.store';
import { RedisSessionStore } from './stores/redis-session.store';
import { SessionStore } from './stores/session.store';
import { logger } from './utils/logger';

export interface Container {
  config: AppConfig;
  store: SessionStore;
  sessionService: SessionService;
  shutdown(): Promise<void>;
}

export interface ContainerOverrides {
  store?: SessionStore;
  verifier?: ExternalVerifier;
  now?: () => number;
}

/**
 * Wires the service graph from configuration. Redis is only connected when
 * the configured store needs it and no store override is supplied.
 */
export async function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Promise<Container> {
  let redisManager: RedisManager | undefined;
  let store: SessionStore;

  if (overrides.store) {
    store = overrides.store;
  } else if (config.session.store === 'memory') {
    logger.warn('Using in-memory session store; sessions will not survive a restart');
    store = new MemorySessionStore(overrides.now);
  } else {
    redisManager = new RedisManager(config.redis);
    store = new RedisSessionStore(await redisManager.connect(), overrides.now);
  }

  const verifier = overrides.verifier ?? new HttpExternalVerifier({
    baseUrl: config.verifier.baseUrl,
    apiKey: config.verifier.apiKey,
    timeoutMs: config.verifier.timeoutMs,
  });
  const verifiers = new VerifierRegistry();
  for (const businessUnit of config.verifier.businessUnits) {
    verifiers.register(businessUnit, verifier);
  }

  const sessionService = new SessionService({
    store,
    tokens: new TokenService({
      secret: config.tokens.secret,
      accessTtlSeconds: config.tokens.accessTtlSeconds,
      refreshTtlSeconds: config.tokens.refreshTtlSeconds,
      now: overrides.now,
    }),
    identity: new IdentityService(config.session.handlePrefix),
    channels: new ChannelRegistry(config.session.channelBusinessUnits),
    verifiers,
    sessionTtlSeconds: config.session.ttlSeconds,
    renewalMode: config.session.renewalMode,
    now: overrides.now,
  });

  return {
    config,
    store,
    sessionService,
    async shutdown(): Promise<void> {
      if (redisManager) {
        await redisManager.disconnect();
      }
    },
  };
}
