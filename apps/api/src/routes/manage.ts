/**
 * Remediation API Routes
 * Entry point for alerting systems: authenticate, validate, remediate.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { REMEDIATION_ACTION_VALUES, formatOutcomeMessage } from '@kubemend/core';
import {
  createChildLogger,
  NamespaceNotAllowedError,
  UnauthorizedError,
  ValidationError,
  wrapError,
} from '@kubemend/shared';

const logger = createChildLogger({ component: 'ManageAPI' });

const K8S_NAME_PATTERN = /^[a-z0-9]([a-z0-9.-]{0,251}[a-z0-9])?$/;

const manageRequestSchema = z.object({
  action: z.enum(REMEDIATION_ACTION_VALUES),
  target: z.string().regex(K8S_NAME_PATTERN, 'Invalid target name'),
  namespace: z
    .string()
    .regex(/^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/, 'Invalid namespace format')
    .optional(),
});

export interface ManageRouteOptions {
  /** Shared secret callers present as `Authorization: Bearer <token>` */
  apiToken: string;
  defaultNamespace: string;
  /** Empty means every namespace is accepted */
  allowedNamespaces: string[];
}

function isAuthorized(header: string | undefined, apiToken: string): boolean {
  if (!header) {
    return false;
  }
  const expected = Buffer.from(`Bearer ${apiToken}`);
  const actual = Buffer.from(header);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

export async function manageRoutes(app: FastifyInstance, options: ManageRouteOptions): Promise<void> {
  /**
   * POST /manage - Apply one remediation to the workload behind `target`
   */
  app.post('/manage', async (request: FastifyRequest, reply: FastifyReply) => {
    // Nothing touches the cluster before the caller is authenticated
    if (!isAuthorized(request.headers.authorization, options.apiToken)) {
      const error = new UnauthorizedError({ ip: request.ip });
      logger.warn({ ip: request.ip, code: error.code }, 'Rejected remediation request with invalid credentials');
      return reply.status(401).send({ status: 'error', detail: error.message });
    }

    try {
      const body = manageRequestSchema.parse(request.body);
      const namespace = body.namespace ?? options.defaultNamespace;

      if (options.allowedNamespaces.length > 0 && !options.allowedNamespaces.includes(namespace)) {
        throw new NamespaceNotAllowedError(namespace, { allowedNamespaces: options.allowedNamespaces });
      }

      const outcome = await app.services.remediationEngine.remediate({
        action: body.action,
        target: body.target,
        namespace,
      });
      const message = formatOutcomeMessage(outcome);

      if (outcome.status === 'failure') {
        return reply.status(500).send({ status: 'error', detail: message, code: outcome.error.code });
      }

      return { status: 'success', message };
    } catch (error) {
      if (error instanceof z.ZodError) {
        const validationError = new ValidationError('Validation failed', { issues: error.errors.length });
        return reply.status(400).send({
          status: 'error',
          detail: validationError.message,
          code: validationError.code,
          errors: error.errors,
        });
      }

      if (error instanceof NamespaceNotAllowedError) {
        logger.warn({ namespace: error.context.namespace }, 'Rejected remediation outside allowed namespaces');
        return reply.status(403).send({ status: 'error', detail: error.message, code: error.code });
      }

      const err = wrapError(error);
      logger.error({ err }, 'Remediation request failed');
      return reply.status(500).send({ status: 'error', detail: err.message, code: err.code });
    }
  });
}
