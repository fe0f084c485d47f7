import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { createHash, timingSafeEqual } from 'crypto';

/**
 * Compares one request header against a configured secret. An empty secret
 * leaves the route open.
 */
@Injectable()
abstract class SharedSecretGuard implements CanActivate {
  protected abstract readonly configKey: string;
  protected abstract readonly header: string;

  constructor(private configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.configService.get<string>(this.configKey) || '';
    if (!expected) {
      return true;
    }
    const request = context.switchToHttp().getRequest<Request>();
    const supplied = request.header(this.header) || '';
    if (!secretsMatch(supplied, expected)) {
      throw new UnauthorizedException(`Missing or invalid ${this.header} header`);
    }
    return true;
  }
}

@Injectable()
export class WebhookSecretGuard extends SharedSecretGuard {
  protected readonly configKey = 'WEBHOOK_SECRET';
  protected readonly header = 'x-webhook-secret';
}

@Injectable()
export class ApiKeyGuard extends SharedSecretGuard {
  protected readonly configKey = 'API_KEY';
  protected readonly header = 'x-api-key';
}

export function secretsMatch(supplied: string, expected: string): boolean {
  // Digests give equal-length buffers for the constant-time compare.
  const a = createHash('sha256').update(supplied).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}
