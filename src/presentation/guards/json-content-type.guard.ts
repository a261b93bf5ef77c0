import { CanActivate, ExecutionContext, Injectable, UnsupportedMediaTypeException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

export const JSON_MEDIA_TYPE = 'application/json';

/**
 * Rejects write requests whose Content-Type is missing or is not JSON (415).
 * Runs before pipes, so the media type is checked ahead of lookups and validation.
 */
@Injectable()
export class JsonContentTypeGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const contentType = request.headers['content-type'];

    if (contentType === undefined || mediaType(contentType) !== JSON_MEDIA_TYPE) {
      throw new UnsupportedMediaTypeException(`Content-Type must be ${JSON_MEDIA_TYPE}`);
    }

    return true;
  }
}

/** "Application/JSON; charset=utf-8" → "application/json" */
function mediaType(header: string): string {
  return header.split(';')[0].trim().toLowerCase();
}
