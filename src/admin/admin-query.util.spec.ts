import { BadRequestException } from '@nestjs/common';
import { collectJoins, parseListQuery, readPath, resolvePath } from './admin-query.util';

describe('admin query helpers', () => {
  it('parsea filtros, búsqueda y paginación', () => {
    const parsed = parseListQuery(
      { q: ' bos ', page: '2', pageSize: '500', 'filter.isActive': 'false', 'filter.divisionId': '3' },
      ['isActive', 'divisionId'],
    );
    expect(parsed).toEqual({
      q: 'bos',
      page: 2,
      pageSize: 100,
      filters: [
        { path: 'isActive', value: false },
        { path: 'divisionId', value: 3 },
      ],
    });
  });

  it('rechaza filtros no registrados y páginas inválidas', () => {
    expect(() => parseListQuery({ 'filter.name': 'x' }, ['isActive'])).toThrow(BadRequestException);
    expect(() => parseListQuery({ page: '0' }, [])).toThrow('page debe ser un entero positivo');
  });

  it('resuelve rutas anidadas a alias de join', () => {
    expect(resolvePath('name')).toEqual({ ref: 'e.name', joins: [] });
    expect(resolvePath('division.conference.name')).toEqual({
      ref: 'division__conference.name',
      joins: [
        { relation: 'e.division', alias: 'division' },
        { relation: 'division.conference', alias: 'division__conference' },
      ],
    });
    expect(collectJoins(['division.name', 'division.conference.id', 'city'])).toEqual([
      { relation: 'e.division', alias: 'division' },
      { relation: 'division.conference', alias: 'division__conference' },
    ]);
  });

  it('lee rutas con getters y devuelve null si falta un tramo', () => {
    class Thing {
      constructor(public first: string, public last: string, public parent: { name: string } | null) {}
      get full() {
        return `${this.first} ${this.last}`;
      }
    }
    const t = new Thing('Connor', 'Test', { name: 'Oilers' });
    expect(readPath(t, 'full')).toBe('Connor Test');
    expect(readPath(t, 'parent.name')).toBe('Oilers');
    expect(readPath(new Thing('a', 'b', null), 'parent.name')).toBeNull();
  });
});
