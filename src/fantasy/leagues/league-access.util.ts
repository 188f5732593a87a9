import { ForbiddenException } from '@nestjs/common';
import { AuthUser, isStaff } from '../../auth/user.decorator';
import { FantasyLeague } from './fantasy-league.entity';

// Comisionado de la liga o staff
export function canManageLeague(league: Pick<FantasyLeague, 'commissionerId'>, user: AuthUser): boolean {
  return league.commissionerId === user.userId || isStaff(user);
}

export function assertCanManageLeague(league: Pick<FantasyLeague, 'commissionerId'>, user: AuthUser): void {
  if (!canManageLeague(league, user)) throw new ForbiddenException('Sólo el comisionado puede gestionar la liga');
}

export function genInviteCode(len = 6) {
  const alphabet = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
  let out = '';
  for (let i = 0; i < len; i++) out += alphabet[Math.floor(Math.random() * alphabet.length)];
  return out;
}
