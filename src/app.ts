import cors from "cors";
import express from "express";
import rateLimit from "express-rate-limit";
import { getExecutionContext, policyMiddleware } from "./gateway/express.js";
import { IntrospectionRegistry } from "./introspection/registry.js";
import { OAuth2PolicyConfiguration } from "./policy/configuration.js";
import { CONTEXT_ATTRIBUTE_CLIENT_ID, CONTEXT_ATTRIBUTE_OAUTH_PAYLOAD, OAuth2Policy } from "./policy/oauth2-policy.js";
import { logger } from "./utils/logger.js";

export interface AppOptions {
  policy: OAuth2PolicyConfiguration;
  resources: IntrospectionRegistry;
}

// Structured logging middleware
const loggingMiddleware = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const startTime = Date.now();

  // Never log the Authorization header
  logger.info('Request received', {
    method: req.method,
    url: req.url,
    headers: {
      'content-type': req.headers['content-type'],
      'user-agent': req.headers['user-agent'],
      'accept': req.headers['accept']
    },
    bodySize: req.headers['content-length']
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    logger.info('Request completed', {
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${duration}ms`
    });
  });

  next();
};

const corsOptions = {
  origin: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: ['WWW-Authenticate'],
  credentials: true
};

/**
 * Protected resource behind the OAuth2 policy: reports the identity the
 * policy recorded for the request.
 */
const protectedResource = (req: express.Request, res: express.Response) => {
  const context = getExecutionContext(res);
  res.json({
    client_id: context?.getAttribute(CONTEXT_ATTRIBUTE_CLIENT_ID),
    payload: context?.getAttribute(CONTEXT_ATTRIBUTE_OAUTH_PAYLOAD)
  });
};

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.use(logger.middleware());
  app.use(loggingMiddleware);

  app.get('/health', (req, res) => {
    res.json({ status: 'healthy' });
  });

  const gatewayRateLimit = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 600,
    message: { error: 'too_many_requests', error_description: 'Gateway rate limit exceeded' }
  });

  app.options('/api/*', cors(corsOptions));
  app.use(
    '/api',
    cors(corsOptions),
    gatewayRateLimit,
    policyMiddleware(new OAuth2Policy(options.policy), { resources: options.resources }),
    protectedResource,
  );

  return app;
}
