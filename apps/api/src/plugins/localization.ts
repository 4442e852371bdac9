/**
 * Localized error responses
 *
 * Negotiates a locale from `Accept-Language` per request and decorates the
 * reply with `sendError`, which renders every failure as
 * `{ error: { code, message, correlationId } }`.
 */

import { type FastifyPluginAsync, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import {
  negotiateLocale,
  toSafeErrorResponse,
  type AppError,
  type Localizer,
  type MessageParams,
  type SupportedLocale,
} from '@schoolreg/core';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    correlationId: string;
    details?: ValidationIssue[];
  };
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ErrorReply {
  statusCode: number;
  code: string;
  params?: MessageParams;
  /** Used when no catalog has a message for the code */
  fallbackMessage?: string;
  details?: ValidationIssue[];
}

declare module 'fastify' {
  interface FastifyRequest {
    locale: SupportedLocale;
  }

  interface FastifyReply {
    sendError(error: ErrorReply): FastifyReply;
    sendAppError(error: AppError): FastifyReply;
  }
}

export interface LocalizationPluginOptions {
  localizer: Localizer;
}

const localizationPlugin: FastifyPluginAsync<LocalizationPluginOptions> = async (
  fastify,
  { localizer }
) => {
  fastify.decorateRequest('locale', 'en-US');

  fastify.addHook('onRequest', async (request) => {
    request.locale = negotiateLocale(request.headers['accept-language']);
  });

  fastify.decorateReply('sendError', function (this: FastifyReply, error: ErrorReply) {
    const body: ErrorBody = {
      error: {
        code: error.code,
        message: localizer.translate(
          this.request.locale,
          error.code,
          error.params,
          error.fallbackMessage
        ),
        correlationId: this.request.correlationId,
      },
    };
    if (error.details) {
      body.error.details = error.details;
    }
    return this.status(error.statusCode).send(body);
  });

  fastify.decorateReply('sendAppError', function (this: FastifyReply, error: AppError) {
    // Unexpected errors collapse to INTERNAL_ERROR and never echo their message
    const safe = toSafeErrorResponse(error);
    return this.sendError({
      statusCode: safe.statusCode,
      code: safe.code,
      params: error.params,
      fallbackMessage: safe.message,
    });
  });
};

export default fp(localizationPlugin, {
  name: 'localization',
  fastify: '5.x',
  dependencies: ['correlation'],
});
