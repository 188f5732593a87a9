import { Body, Controller, Get, HttpCode, HttpStatus, Post, Put } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { LoginDto, RefreshDto, RegisterDto, UpdateProfileDto } from './dto/auth.dto';
import { Public } from './public.decorator';
import { User } from './user.decorator';
import type { AuthUser } from './user.decorator';

@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  // Registro público; staff sólo si ALLOW_REGISTER_ADMIN=true
  @Public()
  @Post('register')
  register(@Body() body: RegisterDto) {
    return this.auth.register(body);
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() body: LoginDto) {
    return this.auth.login(body);
  }

  // Rota el refresh token
  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Body() body: RefreshDto) {
    return this.auth.refresh(body);
  }

  @ApiBearerAuth('bearer')
  @Get('me')
  me(@User() user: AuthUser) {
    return this.auth.me(user.userId);
  }

  @ApiBearerAuth('bearer')
  @Put('me')
  updateMe(@Body() body: UpdateProfileDto, @User() user: AuthUser) {
    return this.auth.updateProfile(user.userId, body);
  }
}
