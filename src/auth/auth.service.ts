import { BadRequestException, ConflictException, Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { createHash, randomUUID } from 'node:crypto';
import { Repository } from 'typeorm';
import { FantasyTeam } from '../fantasy/teams/fantasy-team.entity';
import { LoginDto, RefreshDto, RegisterDto, UpdateProfileDto } from './dto/auth.dto';
import type { JwtPayload } from './jwt.strategy';
import { AppUser } from './user.entity';

export const BCRYPT_ROUNDS = 10;

// bcrypt sólo mira 72 bytes; el JWT completo se resume antes
function tokenDigest(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export interface SuperuserInput {
  username: string;
  email?: string;
  password: string;
}

@Injectable()
export class AuthService {
  constructor(
    @InjectRepository(AppUser) private readonly users: Repository<AppUser>,
    @InjectRepository(FantasyTeam) private readonly teams: Repository<FantasyTeam>,
    private readonly jwt: JwtService,
  ) {}

  async register(dto: RegisterDto) {
    const exists = await this.users.findOne({ where: { username: dto.username } });
    if (exists) throw new BadRequestException('Usuario ya registrado');
    const staff = dto.staff === true && process.env.ALLOW_REGISTER_ADMIN === 'true';
    const user = this.users.create({
      username: dto.username,
      email: dto.email?.toLowerCase() ?? '',
      passwordHash: await bcrypt.hash(dto.password, BCRYPT_ROUNDS),
      isStaff: staff,
    });
    const saved = await this.users.save(user);
    return this.issueSession(saved);
  }

  async login(dto: LoginDto) {
    const user = await this.users.findOne({ where: { username: dto.username } });
    if (!user?.isActive) throw new UnauthorizedException('Credenciales inválidas');
    const ok = await bcrypt.compare(dto.password, user.passwordHash);
    if (!ok) throw new UnauthorizedException('Credenciales inválidas');
    user.lastLogin = new Date();
    return this.issueSession(user);
  }

  async refresh(dto: RefreshDto) {
    let userId: number;
    try {
      const decoded = await this.jwt.verifyAsync<JwtPayload>(dto.refreshToken);
      if (decoded.type !== 'refresh') throw new Error('invalid');
      userId = Number(decoded.sub);
    } catch {
      throw new UnauthorizedException('Refresh inválido');
    }
    const user = await this.users.findOne({ where: { id: userId } });
    if (!user?.isActive || !user.refreshTokenHash) throw new UnauthorizedException('Refresh inválido');
    const ok = await bcrypt.compare(tokenDigest(dto.refreshToken), user.refreshTokenHash);
    if (!ok) throw new UnauthorizedException('Refresh inválido');
    return this.issueSession(user);
  }

  async me(userId: number) {
    const user = await this.users.findOne({ where: { id: userId } });
    if (!user) throw new UnauthorizedException();
    const teams = await this.teams.find({
      where: { ownerId: userId },
      relations: { league: true },
      order: { id: 'ASC' },
    });
    return {
      ...this.profile(user),
      teams: teams.map((t) => ({ teamId: t.id, teamName: t.name, leagueId: t.leagueId, leagueName: t.league.name })),
    };
  }

  async updateProfile(userId: number, dto: UpdateProfileDto) {
    const user = await this.users.findOne({ where: { id: userId } });
    if (!user) throw new UnauthorizedException();
    if (dto.email !== undefined) user.email = dto.email.toLowerCase();
    if (dto.password) {
      user.passwordHash = await bcrypt.hash(dto.password, BCRYPT_ROUNDS);
      // invalida sesiones anteriores
      user.refreshTokenHash = null;
    }
    await this.users.save(user);
    return this.profile(user);
  }

  /** Alta de superusuario (comando createsuperuser). */
  async createSuperuser(input: SuperuserInput) {
    const exists = await this.users.findOne({ where: { username: input.username } });
    if (exists) throw new ConflictException(`El usuario ${input.username} ya existe`);
    const user = this.users.create({
      username: input.username,
      email: input.email?.toLowerCase() ?? '',
      passwordHash: await bcrypt.hash(input.password, BCRYPT_ROUNDS),
      isStaff: true,
      isSuperuser: true,
    });
    return this.profile(await this.users.save(user));
  }

  private profile(u: AppUser) {
    return {
      id: u.id,
      username: u.username,
      email: u.email,
      isStaff: u.isStaff,
      isSuperuser: u.isSuperuser,
      role: this.role(u),
    };
  }

  private role(u: AppUser) {
    return u.isStaff ? ('admin' as const) : ('user' as const);
  }

  // Access + refresh; se guarda el hash del refresh para rotación
  private async issueSession(u: AppUser) {
    const payload: JwtPayload = { sub: u.id, username: u.username, role: this.role(u) };
    const access = this.jwt.sign(payload);
    const refresh = this.jwt.sign({ sub: u.id, type: 'refresh', jti: randomUUID() }, { expiresIn: '30d' });
    u.refreshTokenHash = await bcrypt.hash(tokenDigest(refresh), BCRYPT_ROUNDS);
    await this.users.save(u);
    return { access_token: access, refresh_token: refresh, payload };
  }
}
