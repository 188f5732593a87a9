import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { AuthUser } from './user.decorator';
import type { RoleValue } from './roles.decorator';

export interface JwtPayload {
  sub: number;
  username?: string;
  role?: RoleValue;
  type?: 'refresh';
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(cfg: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: cfg.get<string>('JWT_SECRET') || 'dev-secret',
    });
  }

  validate(payload: JwtPayload): AuthUser {
    // El refresh token no sirve como access token
    if (payload.type === 'refresh' || !payload.username) throw new UnauthorizedException('Token inválido');
    return { userId: Number(payload.sub), username: payload.username, role: payload.role ?? 'user' };
  }
}
