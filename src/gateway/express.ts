import { randomUUID } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import type { IntrospectionRegistry } from '../introspection/registry.js';
import { logger } from '../utils/logger.js';
import { SimpleExecutionContext } from './context.js';
import { HttpHeaders } from './headers.js';
import { ExecutionContext, Policy, PolicyChain, PolicyRequest, PolicyResult } from './types.js';

const EXECUTION_CONTEXT_LOCAL = 'executionContext';

export interface PolicyMiddlewareOptions {
  resources: IntrospectionRegistry;
}

/**
 * The execution context of the current request, once a policy has run.
 */
export function getExecutionContext(res: Response): ExecutionContext | undefined {
  const context: unknown = res.locals[EXECUTION_CONTEXT_LOCAL];
  return context instanceof SimpleExecutionContext ? context : undefined;
}

function createExecutionContext(req: Request, res: Response, resources: IntrospectionRegistry): ExecutionContext {
  const existing = getExecutionContext(res);
  if (existing) {
    return existing;
  }

  // Cancel pending work when the client disconnects before we answered
  const abortController = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      abortController.abort();
    }
  });

  const context = new SimpleExecutionContext({
    requestId: logger.currentRequestId() || req.header('X-Request-Id') || randomUUID(),
    resources,
    signal: abortController.signal
  });
  res.locals[EXECUTION_CONTEXT_LOCAL] = context;
  return context;
}

function writeHeaders(res: Response, headers: HttpHeaders) {
  for (const [name, values] of headers.entries()) {
    res.append(name, values);
  }
}

/**
 * Runs a policy as Express middleware. The policy's chain either continues
 * to the next handler or ends the response with the rejection it reports.
 */
export function policyMiddleware(policy: Policy, options: PolicyMiddlewareOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const context = createExecutionContext(req, res, options.resources);
    const request: PolicyRequest = {
      id: context.requestId,
      method: req.method,
      path: req.path,
      headers: new HttpHeaders(req.headersDistinct)
    };
    const response = { headers: new HttpHeaders() };

    let settled = false;
    const settle = (outcome: string): boolean => {
      if (settled) {
        logger.warning('Policy chain already settled', { outcome });
        return false;
      }
      settled = true;
      return true;
    };

    const chain: PolicyChain = {
      proceed: () => {
        if (!settle('proceed')) {
          return;
        }
        writeHeaders(res, response.headers);
        next();
      },
      reject: (result: PolicyResult) => {
        if (!settle('reject')) {
          return;
        }
        writeHeaders(res, response.headers);
        res.status(result.statusCode);

        if (result.mediaType && result.message !== undefined) {
          res.type(result.mediaType).send(result.message);
          return;
        }

        if (result.message) {
          logger.info('Request rejected', { statusCode: result.statusCode, reason: result.message });
        }
        res.end();
      }
    };

    try {
      policy.onRequest(request, response, context, chain);
    } catch (error) {
      next(error);
    }
  };
}
