// src/seed/seed.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { RosterPosition } from '../fantasy/teams/roster-position.entity';
import { POSITION_CATEGORIES, Position, PositionCategory } from '../players/position.entity';
import { Conference } from '../teams/conference.entity';
import { Division } from '../teams/division.entity';
import { Season } from '../teams/season.entity';
import { Team } from '../teams/team.entity';
import initialData from './initial-data.json';

export interface SeedSummary {
  conferences: number;
  divisions: number;
  seasons: number;
  teams: number;
  positions: number;
  rosterPositions: number;
}

function asCategory(raw: string): PositionCategory {
  const found = POSITION_CATEGORIES.find((c) => c === raw);
  if (!found) throw new Error(`Categoría de posición desconocida: ${raw}`);
  return found;
}

/**
 * Datos de referencia (conferencias, divisiones, temporada actual, 32 equipos,
 * posiciones y posiciones de alineación). Get-or-create: re-ejecutar no duplica.
 */
@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);

  constructor(@InjectDataSource() private readonly ds: DataSource) {}

  async populateInitialData(): Promise<SeedSummary> {
    this.logger.log('Starting to populate database...');
    const summary = await this.ds.transaction((trx) => this.populate(trx));
    this.logger.log('Database populated successfully!');
    return summary;
  }

  private async populate(trx: EntityManager): Promise<SeedSummary> {
    const summary: SeedSummary = { conferences: 0, divisions: 0, seasons: 0, teams: 0, positions: 0, rosterPositions: 0 };

    const conferences = new Map<string, Conference>();
    for (const c of initialData.conferences) {
      let row = await trx.findOne(Conference, { where: { name: c.name } });
      if (!row) {
        row = await trx.save(trx.create(Conference, c));
        summary.conferences++;
      }
      conferences.set(c.abbreviation, row);
    }

    const divisions = new Map<string, Division>();
    for (const d of initialData.divisions) {
      let row = await trx.findOne(Division, { where: { name: d.name } });
      if (!row) {
        const conference = conferences.get(d.conference);
        if (!conference) throw new Error(`Conferencia ${d.conference} no definida`);
        row = await trx.save(trx.create(Division, { name: d.name, abbreviation: d.abbreviation, conferenceId: conference.id }));
        summary.divisions++;
      }
      divisions.set(d.abbreviation, row);
    }

    const s = initialData.season;
    if (!(await trx.count(Season, { where: { name: s.name } }))) {
      await trx.save(trx.create(Season, { ...s, isCurrent: true }));
      summary.seasons++;
    }

    for (const t of initialData.teams) {
      if (await trx.count(Team, { where: { abbreviation: t.abbreviation } })) continue;
      const division = divisions.get(t.division);
      if (!division) throw new Error(`División ${t.division} no definida`);
      const team = await trx.save(
        trx.create(Team, { name: t.name, city: t.city, abbreviation: t.abbreviation, divisionId: division.id }),
      );
      this.logger.log(`Created team: ${team.fullName}`);
      summary.teams++;
    }

    for (const p of initialData.positions) {
      if (await trx.count(Position, { where: { abbreviation: p.abbreviation } })) continue;
      const position = await trx.save(trx.create(Position, { ...p, category: asCategory(p.category) }));
      this.logger.log(`Created position: ${position.name}`);
      summary.positions++;
    }

    for (const rp of initialData.rosterPositions) {
      if (await trx.count(RosterPosition, { where: { abbreviation: rp.abbreviation } })) continue;
      await trx.save(trx.create(RosterPosition, rp));
      summary.rosterPositions++;
    }

    return summary;
  }
}
