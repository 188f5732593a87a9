// src/admin/admin.service.ts
import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { Brackets, DataSource, EntityMetadata, ObjectLiteral, Repository } from 'typeorm';
import { ADMIN_RESOURCES, AdminResource, findResource } from './admin.registry';
import { collectJoins, parseListQuery, readPath, resolvePath, ROOT_ALIAS } from './admin-query.util';

type Join = { relation: string; alias: string };

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((e) => {
    const own = Object.values(e.constraints ?? {});
    const nested = flattenErrors(e.children ?? [], `${prefix}${e.property}.`);
    return own.length ? [...own.map((m) => `${prefix}${m}`), ...nested] : nested;
  });
}

/** Tramo inicial de la ruta que son relaciones ('game.label' -> 'game'). */
function relationPrefix(metadata: EntityMetadata, path: string): string | null {
  const segments = path.split('.');
  const trail: string[] = [];
  let current = metadata;
  for (const seg of segments.slice(0, -1)) {
    const relation = current.findRelationWithPropertyPath(seg);
    if (!relation) break;
    trail.push(seg);
    current = relation.inverseEntityMetadata;
  }
  return trail.length ? trail.join('.') : null;
}

@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(@InjectDataSource() private ds: DataSource) {}

  private resource(name: string): AdminResource {
    const resource = findResource(name);
    if (!resource) throw new NotFoundException(`Recurso desconocido: ${name}`);
    return resource;
  }

  private repo(resource: AdminResource): Repository<ObjectLiteral> {
    return this.ds.getRepository(resource.target);
  }

  /** Relaciones a cargar para pintar listDisplay. */
  private displayRelations(resource: AdminResource, metadata: EntityMetadata): string[] {
    const out = new Set<string>(resource.preload ?? []);
    for (const path of resource.listDisplay) {
      const prefix = relationPrefix(metadata, path);
      if (prefix) out.add(prefix);
    }
    return [...out];
  }

  private display(resource: AdminResource, row: ObjectLiteral): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const path of resource.listDisplay) out[path] = readPath(row, path);
    return out;
  }

  private serialize(resource: AdminResource, row: ObjectLiteral, metadata: EntityMetadata) {
    const hidden = new Set(resource.hiddenFields ?? []);
    const fields: Record<string, unknown> = {};
    for (const column of metadata.columns) {
      if (hidden.has(column.propertyName)) continue;
      fields[column.propertyName] = Reflect.get(row, column.propertyName) ?? null;
    }
    return { ...fields, display: this.display(resource, row) };
  }

  index() {
    return ADMIN_RESOURCES.map((r) => ({
      name: r.name,
      entity: r.target.name,
      listDisplay: r.listDisplay,
      searchFields: r.searchFields,
      listFilter: r.listFilter,
      readonlyFields: r.readonlyFields,
    }));
  }

  async list(name: string, raw: Record<string, unknown>) {
    const resource = this.resource(name);
    const repo = this.repo(resource);
    const query = parseListQuery(raw, resource.listFilter);

    const joins: Join[] = collectJoins([
      ...this.displayRelations(resource, repo.metadata).map((r) => `${r}.id`),
      ...resource.searchFields,
      ...resource.listFilter,
      ...resource.ordering.map(([path]) => path),
    ]);
    const qb = repo.createQueryBuilder(ROOT_ALIAS);
    for (const j of joins) qb.leftJoinAndSelect(j.relation, j.alias);

    query.filters.forEach((f, i) => {
      const { ref } = resolvePath(f.path);
      if (f.value === null) qb.andWhere(`${ref} IS NULL`);
      else qb.andWhere(`${ref} = :f${i}`, { [`f${i}`]: f.value });
    });
    if (query.q && resource.searchFields.length) {
      const like = `%${query.q.toLowerCase()}%`;
      qb.andWhere(
        new Brackets((w) => {
          for (const path of resource.searchFields) w.orWhere(`LOWER(${resolvePath(path).ref}) LIKE :q`, { q: like });
        }),
      );
    }
    for (const [path, dir] of resource.ordering) qb.addOrderBy(resolvePath(path).ref, dir);
    qb.addOrderBy(`${ROOT_ALIAS}.id`, 'ASC');
    qb.skip((query.page - 1) * query.pageSize).take(query.pageSize);

    const [rows, total] = await qb.getManyAndCount();
    return {
      items: rows.map((row) => ({ id: Reflect.get(row, 'id'), ...this.display(resource, row) })),
      total,
      page: query.page,
      pageSize: query.pageSize,
    };
  }

  private async load(resource: AdminResource, id: number, withRelations: boolean): Promise<ObjectLiteral> {
    const repo = this.repo(resource);
    const row = await repo.findOne({
      where: { id },
      relations: withRelations ? this.displayRelations(resource, repo.metadata) : [],
    });
    if (!row) throw new NotFoundException(`${resource.target.name} ${id} no encontrado`);
    return row;
  }

  async get(name: string, id: number) {
    const resource = this.resource(name);
    const row = await this.load(resource, id, true);
    return this.serialize(resource, row, this.repo(resource).metadata);
  }

  private async input(resource: AdminResource, body: Record<string, unknown>, mode: 'create' | 'update') {
    const dto = plainToInstance(mode === 'create' ? resource.createDto : resource.updateDto, body, {
      enableImplicitConversion: true,
    });
    const errors = await validate(dto, { whitelist: true });
    if (errors.length) throw new BadRequestException(flattenErrors(errors));

    const readonly = new Set(resource.readonlyFields);
    const data: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(dto)) {
      if (value !== undefined && !readonly.has(key)) data[key] = value;
    }
    return resource.prepare ? resource.prepare(data, mode) : data;
  }

  async create(name: string, body: Record<string, unknown>) {
    const resource = this.resource(name);
    const repo = this.repo(resource);
    const data = await this.input(resource, body, 'create');
    const saved = await repo.save(repo.create(data));
    const id = Number(Reflect.get(saved, 'id'));
    this.logger.log(`Admin: ${resource.target.name} ${id} creado`);
    return this.get(name, id);
  }

  async update(name: string, id: number, body: Record<string, unknown>) {
    const resource = this.resource(name);
    const repo = this.repo(resource);
    // sin relaciones cargadas: un objeto relacionado pisaría el cambio de FK
    const row = await this.load(resource, id, false);
    const data = await this.input(resource, body, 'update');
    await repo.save(Object.assign(row, data));
    this.logger.log(`Admin: ${resource.target.name} ${id} actualizado`);
    return this.get(name, id);
  }

  async remove(name: string, id: number): Promise<void> {
    const resource = this.resource(name);
    const row = await this.load(resource, id, false);
    await this.repo(resource).remove(row);
    this.logger.log(`Admin: ${resource.target.name} ${id} eliminado`);
  }
}
