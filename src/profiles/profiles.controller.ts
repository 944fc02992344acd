import { Body, Controller, Get, Param, Patch, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { Wallet } from '../common/decorators/wallet.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { presentProfile, type ProfileResponse } from '../common/presenters.js';
import { ProfilesService } from './profiles.service.js';
import {
  UpdateProfileBodySchema,
  type UpdateProfileBody,
} from './dto/update-profile.dto.js';

@ApiTags('Profiles')
@Controller('api/v1/profiles')
export class ProfilesController {
  constructor(private readonly profilesService: ProfilesService) {}

  @Patch('me')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  async updateMe(
    @Wallet() wallet: string,
    @Body(new ZodValidationPipe(UpdateProfileBodySchema)) body: UpdateProfileBody,
  ): Promise<ProfileResponse> {
    return presentProfile(await this.profilesService.rename(wallet, body.username));
  }

  @Get(':wallet')
  async getProfile(@Param('wallet') wallet: string): Promise<ProfileResponse> {
    return presentProfile(await this.profilesService.getByWallet(wallet));
  }
}
