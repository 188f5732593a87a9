import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import type { RoleValue } from './roles.decorator';

export interface AuthUser {
  userId: number;
  username: string;
  role: RoleValue;
}

export type AuthenticatedRequest = Request & { user?: AuthUser };

// Usuario del token; en rutas protegidas siempre existe
export const User = createParamDecorator((_data: unknown, ctx: ExecutionContext): AuthUser => {
  const user = ctx.switchToHttp().getRequest<AuthenticatedRequest>().user;
  if (!user) throw new UnauthorizedException('No autenticado');
  return user;
});

export function isStaff(user: AuthUser): boolean {
  return user.role === 'admin';
}
