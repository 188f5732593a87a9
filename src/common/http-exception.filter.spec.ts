import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { EntityNotFoundError, QueryFailedError } from 'typeorm';
import { GlobalHttpExceptionFilter } from './http-exception.filter';

const driverFailure = (code: string) => new QueryFailedError('INSERT ...', [], Object.assign(new Error('constraint failed'), { code }));

describe('GlobalHttpExceptionFilter.toBody', () => {
  const filter = new GlobalHttpExceptionFilter();

  it('une los mensajes de validación', () => {
    const [status, body] = filter.toBody(new BadRequestException(['name must be a string', 'city must be a string']));
    expect(status).toBe(400);
    expect(body.code).toBe('BAD_REQUEST');
    expect(body.message).toBe('name must be a string; city must be a string');
  });

  it('mapea excepciones HTTP conocidas', () => {
    expect(filter.toBody(new ForbiddenException('No'))).toEqual([403, { code: 'FORBIDDEN', message: 'No' }]);
    expect(filter.toBody(new NotFoundException('Liga no encontrada'))).toEqual([404, { code: 'NOT_FOUND', message: 'Liga no encontrada' }]);
    const [status, body] = filter.toBody(new ConflictException('Ya existe'));
    expect(status).toBe(409);
    expect(body).toMatchObject({ code: 'HTTP_409', message: 'Ya existe' });
  });

  it('traduce errores de base de datos', () => {
    expect(filter.toBody(new EntityNotFoundError('Team', { id: 1 }))[0]).toBe(404);
    expect(filter.toBody(driverFailure('SQLITE_CONSTRAINT_UNIQUE'))).toEqual([409, { code: 'CONFLICT', message: 'Registro duplicado (restricción de unicidad)' }]);
    expect(filter.toBody(driverFailure('23503'))[1].code).toBe('INVALID_REFERENCE');
    expect(filter.toBody(driverFailure('SQLITE_CONSTRAINT_NOTNULL'))[1].code).toBe('MISSING_FIELD');
  });

  it('cualquier otro error es 500', () => {
    expect(filter.toBody(new Error('boom'))).toEqual([500, { code: 'INTERNAL_ERROR', message: 'boom' }]);
  });
});
