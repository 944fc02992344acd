import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/api-errors.js';
import { normalizeWallet } from '../text-utils.js';
import { AppConfigService } from '../../config/app-config.service.js';

export const WALLET_KEY = 'walletAddress';

export interface AccessTokenPayload {
  sub: string;
  username: string;
}

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: AppConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();

    // 1. Bearer token
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const token = authHeader.slice(7);
      let payload: AccessTokenPayload;
      try {
        payload = this.jwtService.verify<AccessTokenPayload>(token);
      } catch {
        throw new UnauthorizedError('Invalid or expired token');
      }
      if (typeof payload.sub !== 'string' || payload.sub === '') {
        throw new UnauthorizedError('Token has no subject');
      }
      Reflect.set(req, WALLET_KEY, normalizeWallet(payload.sub));
      return true;
    }

    // 2. Dev fallback: x-wallet-address (non-production only)
    if (!this.configService.isProduction()) {
      const wallet = req.headers['x-wallet-address'];
      if (typeof wallet === 'string' && wallet.trim() !== '') {
        Reflect.set(req, WALLET_KEY, normalizeWallet(wallet));
        return true;
      }
    }

    throw new UnauthorizedError(
      'Authorization header with Bearer token is required',
    );
  }
}
