import { SqlGenerator } from '../generator.js';
import keywords from './keywords/duckdb.json' with { type: 'json' };

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// keyword_category = 'reserved' in duckdb_keywords()
const RESERVED: ReadonlySet<string> = new Set(keywords);

/** DuckDB folds identifiers case-insensitively, so mixed case stays bare. */
export class DuckDbGenerator extends SqlGenerator {
  override readonly dialect = 'duckdb';

  protected override quoteIdentifier(name: string): string {
    if (PLAIN_IDENTIFIER.test(name) && !this.isReserved(name)) return name;
    return `"${name.replace(/"/g, '""')}"`;
  }

  protected override reservedWords(): ReadonlySet<string> {
    return RESERVED;
  }

  protected override floatType(): string {
    return 'DOUBLE';
  }
}
