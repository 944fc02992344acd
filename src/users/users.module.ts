import { Module } from '@nestjs/common';
import { PetsModule } from '../pets/pets.module.js';
import { StorageModule } from '../storage/storage.module.js';
import { UsersController } from './users.controller.js';
import { UsersService } from './users.service.js';

@Module({
  imports: [PetsModule, StorageModule],
  controllers: [UsersController],
  providers: [UsersService],
})
export class UsersModule {}
