import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { CachedIntrospectionProvider } from "./introspection/cache.js";
import { HttpIntrospectionProvider } from "./introspection/http-provider.js";
import { IntrospectionRegistry } from "./introspection/registry.js";
import { IntrospectionProvider } from "./introspection/types.js";
import { createPolicyConfiguration } from "./policy/configuration.js";
import { RedisClientImpl } from "./redis.js";
import { logger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  logger.setMinimumSeverity(config.logLevel);

  const policy = createPolicyConfiguration(config.policy);
  const resources = new IntrospectionRegistry();

  if (config.introspection.endpoint) {
    let provider: IntrospectionProvider = new HttpIntrospectionProvider({
      endpoint: config.introspection.endpoint,
      clientId: config.introspection.clientId,
      clientSecret: config.introspection.clientSecret,
      timeoutMs: config.introspection.timeoutMs
    });

    if (config.cache.url) {
      const redis = new RedisClientImpl(config.cache.url);
      try {
        await redis.connect();
      } catch (error) {
        logger.error("Could not connect to Redis", error instanceof Error ? error : undefined);
        process.exit(1);
      }
      provider = new CachedIntrospectionProvider(provider, redis, { ttlSeconds: config.cache.ttlSeconds });
    }

    resources.register(policy.introspectionResourceId, provider);
  } else {
    logger.warning('INTROSPECTION_ENDPOINT is not set, every protected request will be rejected', {
      resource: policy.introspectionResourceId
    });
  }

  logger.info('Configuration loaded', {
    port: config.port,
    resource: policy.introspectionResourceId,
    introspectionEndpoint: config.introspection.endpoint,
    checkRequiredScopes: policy.checkRequiredScopes,
    requiredScopes: policy.requiredScopes,
    extractPayload: policy.extractPayload,
    cache: config.cache.enabled ? 'enabled' : 'disabled'
  });

  const app = createApp({ policy, resources });
  app.listen(config.port, () => {
    logger.info('Server started', {
      port: config.port,
      url: `http://localhost:${config.port}`,
      environment: process.env.NODE_ENV || 'development'
    });
  });
}

main().catch((error: unknown) => {
  logger.critical('Gateway failed to start', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
