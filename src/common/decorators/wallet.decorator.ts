import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/api-errors.js';
import { WALLET_KEY } from '../guards/auth.guard.js';

/** Wallet address the AuthGuard attached to the request. */
export const Wallet = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<Request>();
    const wallet: unknown = Reflect.get(req, WALLET_KEY);
    if (typeof wallet !== 'string') {
      throw new UnauthorizedError('No authenticated wallet on request');
    }
    return wallet;
  },
);
