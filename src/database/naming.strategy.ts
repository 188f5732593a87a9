import { DefaultNamingStrategy, NamingStrategyInterface, Table } from 'typeorm';

// sin esquema: 'public.season' -> 'season'
function bareTable(tableOrName: Table | string): string {
  const name = typeof tableOrName === 'string' ? tableOrName : tableOrName.name;
  return name.split('.').pop() ?? name;
}

/**
 * Nombres de constraints legibles y estables (pk_/fk_/uq_/rel_/idx_ + tabla + columnas)
 * en vez de los hashes por defecto, para que las migraciones escritas a mano
 * coincidan con lo que calcula el schema builder.
 */
export class ReadableNamingStrategy extends DefaultNamingStrategy implements NamingStrategyInterface {
  primaryKeyName(tableOrName: Table | string): string {
    return `pk_${bareTable(tableOrName)}`;
  }

  uniqueConstraintName(tableOrName: Table | string, columnNames: string[]): string {
    return `uq_${bareTable(tableOrName)}_${columnNames.join('_')}`;
  }

  relationConstraintName(tableOrName: Table | string, columnNames: string[]): string {
    return `rel_${bareTable(tableOrName)}_${columnNames.join('_')}`;
  }

  foreignKeyName(tableOrName: Table | string, columnNames: string[]): string {
    return `fk_${bareTable(tableOrName)}_${columnNames.join('_')}`;
  }

  indexName(tableOrName: Table | string, columnNames: string[]): string {
    return `idx_${bareTable(tableOrName)}_${columnNames.join('_')}`;
  }
}
