import pg from 'pg';
import { UnsupportedFeatureError } from '../../errors.js';
import type { Expression } from '../../expr/types.js';
import { SqlGenerator } from '../generator.js';
import keywords from './keywords/postgres.json' with { type: 'json' };

// PostgreSQL folds unquoted names to lower case; anything else must be quoted.
const FOLDED_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

// "reserved" and "reserved (can be function or type)" key words
const RESERVED: ReadonlySet<string> = new Set(keywords);

export class PostgresGenerator extends SqlGenerator {
  override readonly dialect = 'postgres';

  protected override quoteIdentifier(name: string): string {
    if (FOLDED_IDENTIFIER.test(name) && !this.isReserved(name)) return name;
    return pg.escapeIdentifier(name);
  }

  protected override reservedWords(): ReadonlySet<string> {
    return RESERVED;
  }

  // escapeLiteral prefixes ` E` when the value holds a backslash
  protected override quoteString(value: string): string {
    return pg.escapeLiteral(value).trimStart();
  }

  protected override floatType(): string {
    return 'DOUBLE PRECISION';
  }

  protected override renderQualify(_condition: Expression): string {
    throw new UnsupportedFeatureError('QUALIFY', this.dialect);
  }
}
