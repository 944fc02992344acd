import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { AccessTokenPayload } from '../common/guards/auth.guard.js';
import type { ProfileRow } from '../db/types/index.js';
import { ProfilesService } from '../profiles/profiles.service.js';

export interface LoginResult {
  accessToken: string;
  profile: ProfileRow;
}

@Injectable()
export class AuthService {
  constructor(
    private readonly jwtService: JwtService,
    private readonly profilesService: ProfilesService,
  ) {}

  async login(walletAddress: string, username?: string): Promise<LoginResult> {
    const profile = await this.profilesService.ensureProfile(walletAddress, username);
    const payload: AccessTokenPayload = {
      sub: profile.walletAddress,
      username: profile.username,
    };
    const accessToken = await this.jwtService.signAsync(payload);
    return { accessToken, profile };
  }
}
