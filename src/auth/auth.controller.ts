import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { Wallet } from '../common/decorators/wallet.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { presentProfile, type ProfileResponse } from '../common/presenters.js';
import { ProfilesService } from '../profiles/profiles.service.js';
import { AuthService } from './auth.service.js';
import { LoginBodySchema, type LoginBody } from './dto/login.dto.js';

@ApiTags('Auth')
@Controller('api/v1/auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly profilesService: ProfilesService,
  ) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body(new ZodValidationPipe(LoginBodySchema)) body: LoginBody,
  ): Promise<{ access_token: string; profile: ProfileResponse }> {
    const { accessToken, profile } = await this.authService.login(
      body.wallet_address,
      body.username,
    );
    return { access_token: accessToken, profile: presentProfile(profile) };
  }

  @Get('me')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  async me(@Wallet() wallet: string): Promise<ProfileResponse> {
    return presentProfile(await this.profilesService.getByWallet(wallet));
  }

  @Delete('me')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteMe(@Wallet() wallet: string): Promise<void> {
    await this.profilesService.delete(wallet);
  }
}
