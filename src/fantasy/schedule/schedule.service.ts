import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { AuthUser } from '../../auth/user.decorator';
import { Season } from '../../teams/season.entity';
import { FantasyLeague } from '../leagues/fantasy-league.entity';
import { assertCanManageLeague } from '../leagues/league-access.util';
import { FantasyTeamWeekPoints } from '../scoring/fantasy-team-week-points.entity';
import { FantasyTeam } from '../teams/fantasy-team.entity';
import { GenerateScheduleDto } from './dto/schedule.dto';
import { FantasyWeek } from './fantasy-week.entity';
import { Matchup } from './matchup.entity';
import { buildWeeks, roundRobin } from './schedule.util';

@Injectable()
export class ScheduleService {
  private readonly logger = new Logger(ScheduleService.name);

  constructor(
    @InjectRepository(FantasyWeek) private weeks: Repository<FantasyWeek>,
    @InjectRepository(FantasyTeamWeekPoints) private weekPoints: Repository<FantasyTeamWeekPoints>,
    @InjectDataSource() private ds: DataSource,
  ) {}

  async generate(leagueId: number, user: AuthUser, dto: GenerateScheduleDto) {
    const result = await this.ds.transaction(async (trx) => {
      const league = await trx.findOne(FantasyLeague, { where: { id: leagueId } });
      if (!league) throw new NotFoundException('Liga no encontrada');
      assertCanManageLeague(league, user);

      const existing = await trx.count(FantasyWeek, { where: { leagueId } });
      if (existing) throw new ConflictException('La liga ya tiene calendario');

      const season = await trx.findOneOrFail(Season, { where: { id: league.seasonId } });
      const plan = buildWeeks(season.startDate, season.endDate, dto.playoffWeeks ?? 0);
      if (!plan.length) throw new BadRequestException('La temporada no tiene días');

      const teams = await trx.find(FantasyTeam, { where: { leagueId } });
      const rounds = league.scoringSystem === 'head_to_head' ? roundRobin(teams.map((t) => t.id)) : [];
      if (league.scoringSystem === 'head_to_head' && !rounds.length) {
        throw new BadRequestException('Se necesitan al menos dos equipos para emparejar');
      }

      const weeks = await trx.save(plan.map((w) => trx.create(FantasyWeek, { leagueId, ...w })));
      const matchups: Matchup[] = [];
      weeks
        .filter((w) => !w.isPlayoffs)
        .forEach((w, i) => {
          if (!rounds.length) return;
          for (const [team1Id, team2Id] of rounds[i % rounds.length]) {
            matchups.push(trx.create(Matchup, { weekId: w.id, team1Id, team2Id }));
          }
        });
      await trx.save(matchups);
      return { weeks: weeks.length, matchups: matchups.length };
    });
    this.logger.log(`League ${leagueId}: ${result.weeks} weeks, ${result.matchups} matchups`);
    return result;
  }

  listWeeks(leagueId: number) {
    return this.weeks.find({ where: { leagueId }, order: { weekNumber: 'ASC' } });
  }

  async weekDetail(weekId: number) {
    const week = await this.weeks.findOne({
      where: { id: weekId },
      relations: { matchups: { team1: true, team2: true } },
    });
    if (!week) throw new NotFoundException('Semana no encontrada');
    const points = await this.weekPoints.find({ where: { weekId }, relations: { fantasyTeam: true } });
    return {
      id: week.id,
      leagueId: week.leagueId,
      weekNumber: week.weekNumber,
      startDate: week.startDate,
      endDate: week.endDate,
      isPlayoffs: week.isPlayoffs,
      isComplete: week.isComplete,
      matchups: week.matchups.map((m) => ({
        id: m.id,
        team1: { id: m.team1Id, name: m.team1.name, score: m.team1Score },
        team2: { id: m.team2Id, name: m.team2.name, score: m.team2Score },
        isComplete: m.isComplete,
        winnerTeamId: m.winnerTeamId,
      })),
      teamPoints: points
        .sort((a, b) => b.points - a.points)
        .map((p) => ({ teamId: p.fantasyTeamId, name: p.fantasyTeam.name, points: p.points })),
    };
  }
}
