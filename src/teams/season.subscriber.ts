import { EntitySubscriberInterface, EventSubscriber, InsertEvent, Not, UpdateEvent } from 'typeorm';
import { Season } from './season.entity';

/**
 * Como mucho una temporada actual: al guardar una con isCurrent=true
 * se desmarcan las demás (misma transacción que el save).
 */
@EventSubscriber()
export class SeasonSubscriber implements EntitySubscriberInterface<Season> {
  listenTo() {
    return Season;
  }

  async beforeInsert(event: InsertEvent<Season>): Promise<void> {
    if (!event.entity?.isCurrent) return;
    await event.manager.update(Season, { isCurrent: true }, { isCurrent: false });
  }

  async beforeUpdate(event: UpdateEvent<Season>): Promise<void> {
    const entity = event.entity;
    if (!entity || entity.isCurrent !== true) return;
    const id: unknown = entity.id ?? event.databaseEntity?.id;
    if (typeof id === 'number') {
      await event.manager.update(Season, { isCurrent: true, id: Not(id) }, { isCurrent: false });
    } else {
      await event.manager.update(Season, { isCurrent: true }, { isCurrent: false });
    }
  }
}
