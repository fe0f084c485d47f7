import { UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { ApiKeyGuard, WebhookSecretGuard, secretsMatch } from './shared-secret.guard';

function contextWithHeaders(headers: Record<string, string>): ExecutionContextHost {
  const request = {
    header: (name: string): string | undefined => headers[name.toLowerCase()],
  };
  return new ExecutionContextHost([request, {}, () => undefined]);
}

function configWith(values: Record<string, string>): ConfigService {
  return new ConfigService(values);
}

describe('SharedSecretGuard', () => {
  it('should allow every request when no secret is configured', () => {
    const guard = new WebhookSecretGuard(configWith({}));
    expect(guard.canActivate(contextWithHeaders({}))).toBe(true);
  });

  it('should accept the matching webhook secret', () => {
    const guard = new WebhookSecretGuard(configWith({ WEBHOOK_SECRET: 'test-secret' }));
    expect(guard.canActivate(contextWithHeaders({ 'x-webhook-secret': 'test-secret' }))).toBe(true);
  });

  it('should reject a wrong or missing webhook secret', () => {
    const guard = new WebhookSecretGuard(configWith({ WEBHOOK_SECRET: 'test-secret' }));
    expect(() => guard.canActivate(contextWithHeaders({ 'x-webhook-secret': 'nope' }))).toThrow(
      UnauthorizedException,
    );
    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
  });

  it('should read the api key from its own header', () => {
    const guard = new ApiKeyGuard(configWith({ API_KEY: 'test-api-key' }));
    expect(guard.canActivate(contextWithHeaders({ 'x-api-key': 'test-api-key' }))).toBe(true);
    expect(() => guard.canActivate(contextWithHeaders({ 'x-webhook-secret': 'test-api-key' }))).toThrow(
      UnauthorizedException,
    );
  });

  it('should compare secrets of different lengths without throwing', () => {
    expect(secretsMatch('a', 'a much longer secret')).toBe(false);
    expect(secretsMatch('same', 'same')).toBe(true);
  });

  it('should receive ConfigService through Nest injection', async () => {
    const module = await Test.createTestingModule({
      providers: [
        WebhookSecretGuard,
        ApiKeyGuard,
        {
          provide: ConfigService,
          useValue: configWith({ WEBHOOK_SECRET: 'test-secret', API_KEY: 'test-api-key' }),
        },
      ],
    }).compile();

    const webhookGuard = module.get(WebhookSecretGuard);
    const apiKeyGuard = module.get(ApiKeyGuard);

    expect(webhookGuard.canActivate(contextWithHeaders({ 'x-webhook-secret': 'test-secret' }))).toBe(true);
    expect(() => webhookGuard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
    expect(apiKeyGuard.canActivate(contextWithHeaders({ 'x-api-key': 'test-api-key' }))).toBe(true);
  });
});
