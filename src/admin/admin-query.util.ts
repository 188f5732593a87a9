import { BadRequestException } from '@nestjs/common';

export const ROOT_ALIAS = 'e';
export const MAX_PAGE_SIZE = 100;
const DEFAULT_PAGE_SIZE = 25;

export type FilterValue = string | number | boolean | null;

export interface ListQuery {
  q?: string;
  filters: Array<{ path: string; value: FilterValue }>;
  page: number;
  pageSize: number;
}

/** 'true'/'false' -> boolean, enteros -> number, 'null' -> null; resto tal cual. */
export function coerceFilterValue(raw: string): FilterValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'null') return null;
  if (/^-?\d+$/.test(raw)) return Number(raw);
  return raw;
}

function positiveInt(raw: unknown, fallback: number, name: string): number {
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new BadRequestException(`${name} debe ser un entero positivo`);
  return n;
}

/** Lee `q`, `page`, `pageSize` y `filter.<path>` de la query string. */
export function parseListQuery(raw: Record<string, unknown>, allowedFilters: string[]): ListQuery {
  const filters: ListQuery['filters'] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith('filter.')) continue;
    const path = key.slice('filter.'.length);
    if (!allowedFilters.includes(path)) throw new BadRequestException(`Filtro no permitido: ${path}`);
    if (typeof value !== 'string') throw new BadRequestException(`Valor de filtro inválido: ${path}`);
    filters.push({ path, value: coerceFilterValue(value) });
  }
  const q = typeof raw.q === 'string' && raw.q.trim() ? raw.q.trim() : undefined;
  const page = positiveInt(raw.page, 1, 'page');
  const pageSize = Math.min(positiveInt(raw.pageSize, DEFAULT_PAGE_SIZE, 'pageSize'), MAX_PAGE_SIZE);
  return { q, filters, page, pageSize };
}

export interface ResolvedPath {
  // alias.propiedad para el query builder
  ref: string;
  joins: Array<{ relation: string; alias: string }>;
}

/**
 * 'division.conference.name' -> joins e.division (division), division.conference (division__conference)
 * y ref 'division__conference.name'.
 */
export function resolvePath(path: string): ResolvedPath {
  const segments = path.split('.');
  const property = segments.pop() ?? path;
  const joins: ResolvedPath['joins'] = [];
  let parent = ROOT_ALIAS;
  const trail: string[] = [];
  for (const seg of segments) {
    trail.push(seg);
    const alias = trail.join('__');
    joins.push({ relation: `${parent}.${seg}`, alias });
    parent = alias;
  }
  return { ref: `${parent}.${property}`, joins };
}

/** Joins de todas las rutas, sin repetir y en orden de dependencia. */
export function collectJoins(paths: string[]): Array<{ relation: string; alias: string }> {
  const seen = new Map<string, string>();
  for (const path of paths) {
    for (const j of resolvePath(path).joins) if (!seen.has(j.alias)) seen.set(j.alias, j.relation);
  }
  return [...seen.entries()].map(([alias, relation]) => ({ relation, alias }));
}

/** Lee `a.b.c` de un objeto (incluye getters). */
export function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const seg of path.split('.')) {
    if (current === null || current === undefined || typeof current !== 'object') return null;
    current = Reflect.get(current, seg);
  }
  return current ?? null;
}
