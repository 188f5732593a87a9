// src/fantasy/scheduler/scheduler.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ScoringService } from '../scoring/scoring.service';

@Injectable()
export class FantasySchedulerService {
  private readonly logger = new Logger(FantasySchedulerService.name);

  constructor(private readonly scoring: ScoringService) {}

  /**
   * Cada hora: recalcula las semanas en curso de cada liga activa
   * y cierra las que ya terminaron (V/D/E incluidos).
   */
  @Cron(CronExpression.EVERY_HOUR)
  async processFantasyWeeks() {
    try {
      const r = await this.scoring.processDueWeeks();
      if (r.computed || r.completed) {
        this.logger.log(`Semanas fantasy: ${r.computed} recalculadas, ${r.completed} cerradas (${r.leagues} ligas)`);
      }
    } catch (e) {
      this.logger.error('Error en processFantasyWeeks()', e instanceof Error ? e.stack : String(e));
    }
  }
}
