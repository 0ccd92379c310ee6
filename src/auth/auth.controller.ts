import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Req,
  UseGuards,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { ApiKeyAuthGuard } from './api-key-auth.guard'
import { AuthService } from './auth.service'
import { requireAuthUser, type AuthedRequest } from './auth.types'
import { CreateApiKeyDto, LoginDto, RegisterDto } from './dto/auth.dto'

@Controller('auth')
@UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  register(@Body() dto: RegisterDto) {
    return this.authService.register(dto.email, dto.password)
  }

  @Post('login')
  @HttpCode(200)
  login(@Body() dto: LoginDto) {
    return this.authService.login(dto.email, dto.password)
  }

  @Get('me')
  @UseGuards(ApiKeyAuthGuard)
  me(@Req() req: AuthedRequest) {
    return this.authService.profile(requireAuthUser(req).userId)
  }

  @Post('api-keys')
  @UseGuards(ApiKeyAuthGuard)
  createApiKey(@Body() dto: CreateApiKeyDto, @Req() req: AuthedRequest) {
    return this.authService.createApiKey(requireAuthUser(req).userId, dto.name)
  }

  @Get('api-keys')
  @UseGuards(ApiKeyAuthGuard)
  listApiKeys(@Req() req: AuthedRequest) {
    return this.authService.listApiKeys(requireAuthUser(req).userId)
  }

  @Delete('api-keys/:id')
  @UseGuards(ApiKeyAuthGuard)
  deleteApiKey(@Param('id', ParseIntPipe) keyId: number, @Req() req: AuthedRequest) {
    return this.authService.deleteApiKey(requireAuthUser(req).userId, keyId)
  }
}
