import { ForbiddenException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AdminGuard, isIpAllowed } from './admin.guard';

const ctx = (headers: Record<string, string>, remoteAddress = '127.0.0.1') =>
  new ExecutionContextHost([{ headers, socket: { remoteAddress } }, {}]);

describe('AdminGuard', () => {
  const guard = (env: Record<string, string>) => new AdminGuard(new ConfigService(env));

  it('is disabled without a configured token', () => {
    expect(() => guard({}).canActivate(ctx({ 'x-admin-token': 'test-secret' }))).toThrow(ForbiddenException);
  });

  it('rejects a wrong token', () => {
    expect(() => guard({ ADMIN_TOKEN: 'test-secret' }).canActivate(ctx({ 'x-admin-token': 'nope' }))).toThrow(
      'Invalid admin token',
    );
  });

  it('accepts the right token', () => {
    expect(guard({ ADMIN_TOKEN: 'test-secret' }).canActivate(ctx({ 'x-admin-token': 'test-secret' }))).toBe(true);
  });

  it('checks the ip allow-list', () => {
    const g = guard({ ADMIN_TOKEN: 'test-secret', ADMIN_IP_ALLOWLIST: '10.0.0.0/8' });
    expect(g.canActivate(ctx({ 'x-admin-token': 'test-secret' }, '10.1.2.3'))).toBe(true);
    expect(g.canActivate(ctx({ 'x-admin-token': 'test-secret', 'x-forwarded-for': '10.9.9.9, 172.16.0.1' }, '192.168.0.1'))).toBe(true);
    expect(() => g.canActivate(ctx({ 'x-admin-token': 'test-secret' }, '192.168.0.1'))).toThrow('IP not allowed');
  });
});

describe('isIpAllowed', () => {
  it('allows everything with an empty list', () => {
    expect(isIpAllowed('203.0.113.7', '')).toBe(true);
  });

  it('matches exact addresses and IPv4-mapped IPv6', () => {
    expect(isIpAllowed('::ffff:127.0.0.1', '127.0.0.1')).toBe(true);
    expect(isIpAllowed('::ffff:10.0.0.5', '10.0.0.0/24')).toBe(true);
    expect(isIpAllowed('10.0.1.5', '10.0.0.0/24')).toBe(false);
  });

  it('ignores malformed rules', () => {
    expect(isIpAllowed('10.0.0.1', 'not-an-ip/8')).toBe(false);
  });
});
