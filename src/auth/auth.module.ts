import { Module } from '@nestjs/common'
import { ApiKeyAuthGuard } from './api-key-auth.guard'
import { AuthController } from './auth.controller'
import { AuthService } from './auth.service'

@Module({
  controllers: [AuthController],
  providers: [AuthService, ApiKeyAuthGuard],
  exports: [AuthService, ApiKeyAuthGuard],
})
export class AuthModule {}
