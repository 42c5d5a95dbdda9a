import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import * as ipaddr from 'ipaddr.js';

export function ipInCidr(ip: string, cidr: string): boolean {
  // cidr: "10.0.0.0/8" 형태
  try {
    const [range, bitsStr] = cidr.split('/');
    const bits = parseInt(bitsStr, 10);
    const addr = ipaddr.process(ip);
    const rangeAddr = ipaddr.process(range);
    if (addr.kind() !== rangeAddr.kind()) return false;
    return addr.match(rangeAddr, bits);
  } catch {
    return false;
  }
}

export function isIpAllowed(reqIp: string, allowlist: string): boolean {
  if (!allowlist.trim()) return true; // allowlist 비어있으면 IP 체크 생략
  const items = allowlist.split(',').map(s => s.trim()).filter(Boolean);
  for (const rule of items) {
    if (rule.includes('/')) {
      if (ipInCidr(reqIp, rule)) return true;
    } else if (sameIp(reqIp, rule)) {
      return true;
    }
  }
  return false;
}

// ::ffff:127.0.0.1 과 127.0.0.1 은 같은 주소
function sameIp(a: string, b: string): boolean {
  if (!ipaddr.isValid(a) || !ipaddr.isValid(b)) return a === b;
  return ipaddr.process(a).toString() === ipaddr.process(b).toString();
}

export function clientIp(req: Request): string {
  const fwd = req.headers['x-forwarded-for'];
  const first = (Array.isArray(fwd) ? fwd[0] : fwd)?.split(',')[0];
  return (first ?? req.socket.remoteAddress ?? '').trim();
}

/** 운영 API 보호. x-admin-token 일치 + (선택) IP 허용 목록 */
@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private readonly cfg: ConfigService) {}

  canActivate(ctx: ExecutionContext): boolean {
    const expected = this.cfg.get<string>('ADMIN_TOKEN');
    // 토큰이 설정되지 않았으면 운영 API 자체를 막는다
    if (!expected) {
      throw new ForbiddenException('Admin API disabled');
    }

    const req = ctx.switchToHttp().getRequest<Request>();
    const token = req.headers['x-admin-token'];
    if (token !== expected) {
      throw new ForbiddenException('Invalid admin token');
    }

    const allowlist = this.cfg.get<string>('ADMIN_IP_ALLOWLIST') ?? '';
    if (!isIpAllowed(clientIp(req), allowlist)) {
      throw new ForbiddenException('IP not allowed');
    }

    return true;
  }
}
